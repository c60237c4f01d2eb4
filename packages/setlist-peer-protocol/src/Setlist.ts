import { createLibp2p } from "libp2p";
import { tcp } from "@libp2p/tcp";
import { mdns } from "@libp2p/mdns";
import { gossipsub } from "@chainsafe/libp2p-gossipsub";
import { noise } from "@chainsafe/libp2p-noise";
import { yamux } from "@chainsafe/libp2p-yamux";
import { identify } from "@libp2p/identify";
import { multiaddr } from "@multiformats/multiaddr";
import { z } from "zod";

import { CatalogStore } from "./CatalogStore.js";
import { Coordinator } from "./Coordinator.js";
import { StartupFatalError, errorMessage } from "./errors.js";
import { PeerView } from "./PeerView.js";
import type {
  BroadcastTopic,
  Logger,
  NodeConfig,
  NodeContext,
  NodeEventEnvelope,
  NodeEventListener,
} from "./types.js";

// ---------- Schema for event‐envelope validation ----------
const NodeEventEnvelopeSchema = z.object({
  source: z.string().min(1),
  payload: z.record(z.unknown()),
});

async function createSetlistLibp2p(config: NodeConfig) {
  return createLibp2p({
    start: false,
    addresses: { listen: config.listen },
    transports: [tcp()],
    connectionEncrypters: [noise()],
    streamMuxers: [yamux()],
    peerDiscovery: config.enableMdns ? [mdns({ interval: 1000 })] : [],
    services: {
      identify: identify(),
      pubsub: gossipsub({ allowPublishToZeroTopicPeers: true, emitSelf: false }),
    },
  });
}

export type SetlistLibp2p = Awaited<ReturnType<typeof createSetlistLibp2p>>;

/**
 * TopicMessage: the parts of a gossipsub message the node looks at.
 */
export type TopicMessage = { topic: string; data: Uint8Array } & (
  | { type: "signed"; from: { toString(): string } }
  | { type: "unsigned" }
);

/**
 * Identity of the peer that signed `message`, or null when it is not for
 * `topic` or carries no verifiable sender.
 */
export function senderOf(message: TopicMessage, topic: string): string | null {
  if (message.topic !== topic || message.type !== "signed") {
    return null;
  }
  return message.from.toString();
}

/**
 * Setlist: one node on the song-sharing topic.
 *
 * Owns the libp2p stack (TCP + noise + yamux, gossipsub for the broadcast
 * topic, mDNS for discovery) and wires it to the catalog store, peer view
 * and coordinator. Everything protocol-level happens in the coordinator;
 * this class only moves bytes and discovery notifications into it.
 */
export class Setlist {
  private libp2p: SetlistLibp2p | null = null;
  private coordinator: Coordinator | null = null;
  private context: NodeContext | null = null;
  private loop: Promise<void> | null = null;
  private listeners: NodeEventListener[] = [];

  readonly store: CatalogStore;
  readonly peers: PeerView;

  constructor(
    private readonly config: NodeConfig,
    private readonly logger: Logger = console,
  ) {
    this.store = new CatalogStore(config.catalogPath);
    this.peers = new PeerView((peerId) => this.isConnected(peerId));
  }

  /**
   * Bring the node up:
   * 1) Create and start libp2p (identity is generated here).
   * 2) Subscribe to the topic and forward its messages to the coordinator.
   * 3) Feed discovery into the peer view.
   * 4) Start the coordinator loop.
   *
   * Any failure is a StartupFatalError; nothing is left running.
   */
  async initialize(): Promise<NodeContext> {
    if (this.libp2p) {
      throw new StartupFatalError("Setlist: node is already running");
    }

    let node: SetlistLibp2p;
    try {
      this.logger.log("Setlist: Initializing libp2p node…");
      node = await createSetlistLibp2p(this.config);
    } catch (err) {
      throw new StartupFatalError(`cannot create libp2p node: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const context: NodeContext = {
      peerId: node.peerId.toString(),
      topic: this.config.topic,
    };
    const topic: BroadcastTopic = {
      publish: async (payload) => {
        await node.services.pubsub.publish(context.topic, payload);
      },
    };
    const coordinator = new Coordinator({
      context,
      store: this.store,
      topic,
      peers: this.peers,
      logger: this.logger,
    });

    node.services.pubsub.addEventListener("message", (evt) => {
      const message = evt.detail;
      const from = senderOf(message, context.topic);
      if (from === null) {
        if (message.topic === context.topic) {
          this.logger.debug("Setlist: dropping unsigned message");
        }
        return;
      }
      coordinator.receive(message.data, from);
    });

    // mDNS announcements and direct connections both count as discovery.
    node.addEventListener("peer:discovery", (evt) => {
      const peerId = evt.detail.id;
      this.peerFound(peerId.toString());
      node.dial(peerId).catch((err: unknown) => {
        this.logger.debug(`Setlist: dial ${peerId.toString()} failed: ${errorMessage(err)}`);
        this.peerLost(peerId.toString());
      });
    });

    node.addEventListener("peer:connect", (evt) => {
      this.peerFound(evt.detail.toString());
    });

    node.addEventListener("peer:disconnect", (evt) => {
      this.peerLost(evt.detail.toString());
    });

    try {
      await node.start();
      node.services.pubsub.subscribe(context.topic);
    } catch (err) {
      await Promise.resolve(node.stop()).catch((stopErr: unknown) => {
        this.logger.warn(`Setlist: cleanup after failed start: ${errorMessage(stopErr)}`);
      });
      throw new StartupFatalError(`cannot start libp2p node: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    this.libp2p = node;
    this.coordinator = coordinator;
    this.context = context;
    this.loop = coordinator.run();

    this.logger.log(`Setlist: Node started with ID: ${context.peerId}`);
    this.logger.log(`Setlist: Topic: ${context.topic}, catalog: ${this.store.path}`);
    for (const addr of node.getMultiaddrs()) {
      this.logger.log(`Setlist: Listening on ${addr.toString()}`);
    }
    this.emit("nodeStarted", { source: "setlist", payload: { nodeId: context.peerId } });

    for (const addr of this.config.peers) {
      await this.connectToPeer(addr).catch((err: unknown) => {
        this.logger.warn(`Setlist: could not reach ${addr}: ${errorMessage(err)}`);
      });
    }
    return context;
  }

  /** Dial a peer by multiaddr, e.g. `/ip4/10.0.0.2/tcp/4001/p2p/<id>`. */
  async connectToPeer(addr: string): Promise<void> {
    if (!this.libp2p) {
      throw new Error("Setlist: node is not running");
    }
    await this.libp2p.dial(multiaddr(addr));
  }

  /** Addresses other peers can dial, each ending in `/p2p/<id>`. */
  getMultiaddrs(): string[] {
    if (!this.libp2p) {
      return [];
    }
    return this.libp2p.getMultiaddrs().map((addr) => addr.toString());
  }

  /** Hand a line of operator input to the coordinator. */
  submitInput(line: string): void {
    this.runningCoordinator().submitInput(line);
  }

  /** Hand the fields of an interactively entered song to the coordinator. */
  submitSong(fields: string[]): void {
    this.runningCoordinator().submitSong(fields);
  }

  getNodeId(): string {
    if (!this.context) {
      throw new Error("Setlist: node is not running");
    }
    return this.context.peerId;
  }

  /** Subscribe to node‐level events. */
  onEvent(callback: NodeEventListener): void {
    this.listeners.push(callback);
  }

  emit(event: string, envelope: NodeEventEnvelope): void {
    if (!NodeEventEnvelopeSchema.safeParse(envelope).success) {
      this.logger.warn("Setlist: emit called with invalid envelope, dropping:", envelope);
      return;
    }
    for (const listener of this.listeners) {
      try {
        listener(event, envelope);
      } catch (err) {
        this.logger.warn(`Setlist: listener for "${event}" failed: ${errorMessage(err)}`);
      }
    }
  }

  /**
   * Gracefully shut down: drain the coordinator (in-flight responses are
   * still published), then stop libp2p.
   */
  async stop(): Promise<void> {
    const node = this.libp2p;
    if (!node) {
      return;
    }
    if (this.coordinator) {
      await this.coordinator.stop();
    }
    if (this.loop) {
      await this.loop;
    }
    await node.stop();

    const nodeId = this.context?.peerId ?? "unknown";
    this.libp2p = null;
    this.coordinator = null;
    this.loop = null;
    this.logger.log("Setlist: Node stopped");
    this.emit("nodeStopped", { source: "setlist", payload: { nodeId } });
  }

  private runningCoordinator(): Coordinator {
    if (!this.coordinator) {
      throw new Error("Setlist: node is not running");
    }
    return this.coordinator;
  }

  private peerFound(peerId: string): void {
    if (this.peers.discovered(peerId)) {
      this.emit("peerDiscovered", { source: "setlist", payload: { peerId } });
    }
  }

  /** Departure means "no open connection"; a fresh reconnect keeps the peer. */
  private peerLost(peerId: string): void {
    if (this.peers.departed(peerId)) {
      this.emit("peerDeparted", { source: "setlist", payload: { peerId } });
    }
  }

  private isConnected(peerId: string): boolean {
    if (!this.libp2p) {
      return false;
    }
    return this.libp2p.getConnections().some((c) => c.remotePeer.toString() === peerId);
  }
}
