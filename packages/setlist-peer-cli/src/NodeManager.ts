import { Setlist } from "setlist-peer-protocol";
import type { Logger, NodeConfig } from "setlist-peer-protocol";
import { OperatorConsole } from "./OperatorConsole.js";

/**
 * NodeManager: lifecycle around one Setlist node and the operator console
 * feeding it.
 */
export class NodeManager {
  private node: Setlist | null = null;
  private operator: OperatorConsole | null = null;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly logger: Logger = console,
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  /**
   * Start the node and begin reading commands. `onInputClosed` runs when the
   * operator's input ends (Ctrl-D or a closed pipe).
   */
  async start(config: NodeConfig, onInputClosed: () => void): Promise<void> {
    if (this.node) {
      throw new Error("Node is already running");
    }

    const operator = new OperatorConsole(this.input, this.output);
    const node = new Setlist(config, this.logger);
    await node.initialize();

    node.onEvent((event, envelope) => {
      this.logger.debug(`[Event] ${event}:`, envelope.payload);
    });

    this.node = node;
    this.operator = operator;
    operator.start({
      onLine: (line) => node.submitInput(line),
      onSong: (fields) => node.submitSong(fields),
      onClose: onInputClosed,
    });
  }

  /** Stop reading input, then shut the node down. Safe to call twice. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  getNodeId(): string {
    if (!this.node) {
      throw new Error("Node is not running. Start the node first with: setlist-peer start");
    }
    return this.node.getNodeId();
  }

  private async shutdown(): Promise<void> {
    if (this.operator) {
      this.operator.close();
      this.operator = null;
    }
    if (this.node) {
      await this.node.stop();
      this.node = null;
    }
  }
}
