import type { CatalogStore } from "./CatalogStore.js";
import { errorMessage } from "./errors.js";
import { ALL } from "./messages.js";
import type { ListResponse, Logger } from "./types.js";

export type ResponseSink = (response: ListResponse) => void;

/**
 * ResponseProducer: builds answers to list requests off the coordinator's
 * path. Each request gets its own task; the finished response is handed to
 * `deliver`, never published from here.
 */
export class ResponseProducer {
  private inFlight: Set<Promise<void>> = new Set();

  constructor(
    private readonly store: CatalogStore,
    private readonly deliver: ResponseSink,
    private readonly logger: Logger = console,
  ) {}

  /** Number of productions that have not finished yet. */
  get pending(): number {
    return this.inFlight.size;
  }

  /** Start building a response for `requester` and return immediately. */
  produce(requester: string): void {
    const task = this.build(requester).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  /** Resolve once every production started so far has finished. */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  private async build(requester: string): Promise<void> {
    try {
      const data = await this.store.publicSnapshot();
      const response: ListResponse = { mode: ALL, data, receiver: requester };
      this.deliver(response);
    } catch (err) {
      this.logger.error(
        `ResponseProducer: error fetching local songs to answer ${requester}: ${errorMessage(err)}`,
      );
    }
  }
}
