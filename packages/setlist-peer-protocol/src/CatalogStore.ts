import { promises as fs } from "fs";
import { z } from "zod";
import { PersistenceError, errorMessage } from "./errors.js";
import type { Catalog, Song } from "./types.js";

// ---------- Schema for persisted catalog documents ----------
// Unknown per-record keys are stripped on load, so they do not survive a save.
export const SongSchema = z.object({
  id: z.number().int().nonnegative(),
  title: z.string(),
  artist: z.string(),
  lyrics: z.string(),
  explicit: z.string(),
  public: z.boolean(),
});

export const CatalogSchema = z.array(SongSchema);

const EXPLICIT_TOKENS = new Set(["true", "yes", "y", "1", "explicit"]);

/** True when the free-text explicit flag matches one of the truthy tokens. */
export function isExplicit(flag: string): boolean {
  return EXPLICIT_TOKENS.has(flag.trim().toLowerCase());
}

export interface NewSong {
  title: string;
  artist: string;
  lyrics: string;
  explicit: string;
}

/**
 * CatalogStore: the only way in or out of the catalog file.
 *
 * Every public operation is a complete load → mutate → save cycle; nothing
 * is cached between calls. Cycles run one at a time through `exclusive()`,
 * so a response being built for a peer never observes a half-applied
 * command.
 */
export class CatalogStore {
  private readonly filePath: string;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Create an empty catalog file. Returns false (and leaves the file alone)
   * when one already exists.
   */
  async init(): Promise<boolean> {
    return this.exclusive(async () => {
      try {
        await fs.writeFile(this.filePath, "[]\n", { encoding: "utf8", flag: "wx" });
        return true;
      } catch (err) {
        if (isErrnoException(err) && err.code === "EEXIST") {
          return false;
        }
        throw new PersistenceError(
          `cannot create catalog at ${this.filePath}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    });
  }

  async load(): Promise<Catalog> {
    return this.exclusive(() => this.readCatalog());
  }

  async save(catalog: Catalog): Promise<void> {
    return this.exclusive(() => this.writeCatalog(catalog));
  }

  /** Append a new private song with the next free id. */
  async create(song: NewSong): Promise<Song> {
    return this.exclusive(async () => {
      const catalog = await this.readCatalog();
      const created: Song = {
        id: nextId(catalog),
        title: song.title,
        artist: song.artist,
        lyrics: song.lyrics,
        explicit: song.explicit,
        public: false,
      };
      catalog.push(created);
      await this.writeCatalog(catalog);
      return created;
    });
  }

  /**
   * Remove the song with `id`. Resolves to the removed song, or `undefined`
   * when there is none; the file is not rewritten in that case.
   */
  async delete(id: number): Promise<Song | undefined> {
    return this.exclusive(async () => {
      const catalog = await this.readCatalog();
      const index = catalog.findIndex((s) => s.id === id);
      if (index === -1) {
        return undefined;
      }
      const [removed] = catalog.splice(index, 1);
      await this.writeCatalog(catalog);
      return removed;
    });
  }

  /**
   * Mark a song public or private. Resolves to the updated song, or
   * `undefined` when `id` is not in the catalog.
   */
  async setVisibility(id: number, visible: boolean): Promise<Song | undefined> {
    return this.exclusive(async () => {
      const catalog = await this.readCatalog();
      const song = catalog.find((s) => s.id === id);
      if (!song) {
        return undefined;
      }
      song.public = visible;
      await this.writeCatalog(catalog);
      return song;
    });
  }

  /** Public songs only. Everything that leaves this node is built from here. */
  async publicSnapshot(): Promise<Song[]> {
    return this.exclusive(async () => {
      const catalog = await this.readCatalog();
      return catalog.filter((s) => s.public);
    });
  }

  protected async readCatalog(): Promise<Catalog> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new PersistenceError(`catalog file not found: ${this.filePath}`, { cause: err });
      }
      throw new PersistenceError(`cannot read catalog ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(`catalog ${this.filePath} is not valid JSON`, { cause: err });
    }

    const parsed = CatalogSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new PersistenceError(
        `catalog ${this.filePath} is malformed${where}: ${issue?.message ?? "invalid"}`,
      );
    }
    return parsed.data;
  }

  protected async writeCatalog(catalog: Catalog): Promise<void> {
    const json = JSON.stringify(catalog, null, 2) + "\n";
    try {
      await fs.writeFile(this.filePath, json, "utf8");
    } catch (err) {
      throw new PersistenceError(`cannot write catalog ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.catch(() => undefined);
    return run;
  }
}

function nextId(catalog: Catalog): number {
  return catalog.reduce((max, s) => Math.max(max, s.id), -1) + 1;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
