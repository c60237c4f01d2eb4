/**
 * Song: One catalog entry. `public` controls whether it may leave this node.
 */
export interface Song {
  id: number;
  title: string;
  artist: string;
  lyrics: string;
  /** Free text; see `isExplicit()` for the tokens that count as truthy. */
  explicit: string;
  public: boolean;
}

/**
 * Catalog: The ordered list of songs persisted by one node.
 */
export type Catalog = Song[];

/**
 * ListMode: Ask every peer, or a single peer by identity.
 */
export type ListMode = { type: "all" } | { type: "one"; peer: string };

export interface ListRequest {
  mode: ListMode;
}

/**
 * ListResponse: Public songs of the responding node, addressed to `receiver`.
 */
export interface ListResponse {
  mode: ListMode;
  data: Song[];
  receiver: string;
}

export interface ChatMessage {
  text: string;
}

/**
 * Envelope: What actually travels on the broadcast topic.
 */
export type Envelope =
  | { kind: "request"; payload: ListRequest }
  | { kind: "response"; payload: ListResponse }
  | { kind: "chat"; payload: ChatMessage };

/**
 * NodeContext: Process-wide identity, fixed once the node has started.
 * Built at startup and handed to every component that needs it.
 */
export interface NodeContext {
  peerId: string;
  topic: string;
}

/**
 * NodeConfig: Resolved startup configuration of a node.
 */
export interface NodeConfig {
  catalogPath: string;
  topic: string;
  listen: string[];
  /** Multiaddrs dialed once the node is up. */
  peers: string[];
  enableMdns: boolean;
}

/**
 * BroadcastTopic: Publish side of the shared topic. Delivery is
 * best-effort, at-least-once, unordered across publishers.
 */
export interface BroadcastTopic {
  publish(payload: Uint8Array): Promise<void>;
}

/**
 * Logger: Where operator-visible output and diagnostics go. `console`
 * satisfies it.
 */
export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

/**
 * CoordinatorEvent: What the coordinator waits on. Operator input arrives
 * as a command line or as the collected fields of an interactive song.
 */
export type CoordinatorEvent =
  | { type: "input"; line: string }
  | { type: "song"; fields: string[] }
  | { type: "response"; response: ListResponse }
  | { type: "inbound"; payload: Uint8Array; from: string };

/**
 * NodeEventEnvelope: Payload of node-level events delivered to `onEvent`.
 */
export interface NodeEventEnvelope {
  source: string;
  payload: Record<string, unknown>;
}

export type NodeEventListener = (event: string, envelope: NodeEventEnvelope) => void;
