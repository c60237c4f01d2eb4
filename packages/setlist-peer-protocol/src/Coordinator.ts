import { type CatalogStore, type NewSong, isExplicit } from "./CatalogStore.js";
import { COMMAND_HELP, type Command, buildNewSong, parseCommand } from "./commands.js";
import { CommandInputError, PersistenceError, errorMessage } from "./errors.js";
import { Mailbox } from "./Mailbox.js";
import { classify, describeMode, encodeEnvelope } from "./messages.js";
import type { PeerView } from "./PeerView.js";
import { ResponseProducer } from "./ResponseProducer.js";
import type {
  BroadcastTopic,
  CoordinatorEvent,
  Envelope,
  ListResponse,
  Logger,
  NodeContext,
  Song,
} from "./types.js";

export interface CoordinatorOptions {
  context: NodeContext;
  store: CatalogStore;
  topic: BroadcastTopic;
  peers: PeerView;
  logger?: Logger;
}

/**
 * Coordinator: the node's single control loop.
 *
 * Operator input, finished responses and inbound payloads all land in one
 * mailbox. `run()` takes them out one at a time and handles each to
 * completion before looking at the next, so catalog-changing commands never
 * overlap. It is also the only place that publishes to the topic.
 */
export class Coordinator {
  readonly producer: ResponseProducer;

  private readonly context: NodeContext;
  private readonly store: CatalogStore;
  private readonly topic: BroadcastTopic;
  private readonly peers: PeerView;
  private readonly logger: Logger;
  private readonly mailbox: Mailbox<CoordinatorEvent> = new Mailbox();

  constructor(options: CoordinatorOptions) {
    this.context = options.context;
    this.store = options.store;
    this.topic = options.topic;
    this.peers = options.peers;
    this.logger = options.logger ?? console;
    this.producer = new ResponseProducer(
      this.store,
      (response) => {
        this.enqueue({ type: "response", response });
      },
      this.logger,
    );
  }

  /** Queue a line typed by the operator. */
  submitInput(line: string): void {
    this.enqueue({ type: "input", line });
  }

  /**
   * Queue a song whose fields were collected interactively, in the order
   * title, artist, lyrics, explicit.
   */
  submitSong(fields: string[]): void {
    this.enqueue({ type: "song", fields });
  }

  /** Queue a payload that arrived on the topic from `from`. */
  receive(payload: Uint8Array, from: string): void {
    this.enqueue({ type: "inbound", payload, from });
  }

  /**
   * Process events until `stop()` is called and the mailbox is drained.
   */
  async run(): Promise<void> {
    for (;;) {
      const event = await this.mailbox.next();
      if (event === undefined) {
        return;
      }
      await this.dispatch(event);
    }
  }

  /**
   * Let in-flight responses reach the mailbox, then stop accepting events.
   * `run()` returns once what is already queued has been handled.
   */
  async stop(): Promise<void> {
    await this.producer.settled();
    this.mailbox.close();
  }

  /** Handle exactly one event. Steady-state errors are reported, never thrown. */
  async dispatch(event: CoordinatorEvent): Promise<void> {
    try {
      switch (event.type) {
        case "input":
          await this.handleInput(event.line);
          break;
        case "song":
          await this.createSong(buildNewSong(event.fields));
          break;
        case "response":
          await this.publishResponse(event.response);
          break;
        case "inbound":
          this.handleInbound(event.payload, event.from);
          break;
      }
    } catch (err) {
      this.report(err);
    }
  }

  private enqueue(event: CoordinatorEvent): void {
    if (!this.mailbox.push(event)) {
      this.logger.debug(`Setlist: coordinator stopped, dropping ${event.type} event`);
    }
  }

  private async handleInput(line: string): Promise<void> {
    const command = parseCommand(line);
    await this.execute(command);
  }

  private async execute(command: Command): Promise<void> {
    switch (command.type) {
      case "noop":
        return;
      case "help":
        this.logger.log("Commands:");
        for (const [usage, summary] of COMMAND_HELP) {
          this.logger.log(`  ${usage.padEnd(22)} ${summary}`);
        }
        return;
      case "listPeers":
        this.printPeers();
        return;
      case "listLocalSongs":
        await this.printLocalSongs();
        return;
      case "listRemoteSongs":
        this.logger.log(`Requesting songs: ${describeMode(command.mode)}`);
        await this.publish({ kind: "request", payload: { mode: command.mode } });
        return;
      case "createSong":
        if (!command.song) {
          throw new CommandInputError(
            "missing song fields - Format: create song title|artist|lyrics|explicit",
          );
        }
        await this.createSong(command.song);
        return;
      case "deleteSong": {
        const removed = await this.store.delete(command.id);
        if (removed) {
          this.logger.log(`Deleted song with id: ${command.id}`);
        } else {
          this.logger.warn(`No song with id: ${command.id}`);
        }
        return;
      }
      case "publishSong":
      case "privateSong": {
        const visible = command.type === "publishSong";
        const song = await this.store.setVisibility(command.id, visible);
        if (song) {
          this.logger.log(`${visible ? "Published" : "Made private"} song with id: ${command.id}`);
        } else {
          this.logger.warn(`No song with id: ${command.id}`);
        }
        return;
      }
      case "chat":
        await this.publish({ kind: "chat", payload: { text: command.text } });
        return;
    }
  }

  private async createSong(fields: NewSong): Promise<void> {
    const song = await this.store.create(fields);
    this.logger.log(`Created song #${song.id}: ${formatSong(song)}`);
  }

  private handleInbound(payload: Uint8Array, from: string): void {
    const result = classify(payload, this.context);
    switch (result.kind) {
      case "response":
        this.logger.log(`Response from ${from}:`);
        if (result.response.data.length === 0) {
          this.logger.log("  (no public songs)");
        }
        for (const song of result.response.data) {
          this.logger.log(`  ${formatSong(song)}`);
        }
        return;
      case "request":
        this.logger.log(
          `Received ${describeMode(result.request.mode)} request from ${from}`,
        );
        this.producer.produce(from);
        return;
      case "chat":
        this.logger.log(`[chat] ${from}: ${result.message.text}`);
        return;
      case "ignored":
        this.logger.debug(`Setlist: ignoring ${result.reason} from ${from}`);
        return;
      case "miss":
        this.logger.debug(`Setlist: discarding unrecognized payload from ${from}`);
        return;
    }
  }

  /** Responses are re-published as delivered; peers sort out the receiver. */
  private async publishResponse(response: ListResponse): Promise<void> {
    await this.publish({ kind: "response", payload: response });
    this.logger.debug(
      `Setlist: sent ${response.data.length} public song(s) to ${response.receiver}`,
    );
  }

  private async publish(envelope: Envelope): Promise<void> {
    await this.topic.publish(encodeEnvelope(envelope));
  }

  private printPeers(): void {
    const peers = this.peers.currentPeers();
    this.logger.log(`Discovered Peers (${peers.length}):`);
    for (const peer of peers) {
      this.logger.log(`  ${peer}`);
    }
  }

  private async printLocalSongs(): Promise<void> {
    const catalog = await this.store.load();
    this.logger.log(`Local Songs (${catalog.length})`);
    for (const song of catalog) {
      this.logger.log(`  ${formatSong(song)}${song.public ? "" : " (private)"}`);
    }
  }

  private report(err: unknown): void {
    if (err instanceof CommandInputError) {
      this.logger.error(err.message);
    } else if (err instanceof PersistenceError) {
      this.logger.error(`catalog error: ${err.message}`);
    } else {
      this.logger.error(`Setlist: ${errorMessage(err)}`);
    }
  }
}

/** One song as a row: `id. title [E] | artist | lyrics`. */
export function formatSong(song: Song): string {
  const title = isExplicit(song.explicit) ? `${song.title} [E]` : song.title;
  return `${song.id}. ${title} | ${song.artist} | ${song.lyrics}`;
}
