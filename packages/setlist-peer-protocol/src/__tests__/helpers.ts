import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { vi } from "vitest";
import type { BroadcastTopic, Logger, Song } from "../types.js";

export async function tempCatalogPath(contents?: Song[] | string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "setlist-"));
  const file = path.join(dir, "songs.json");
  if (typeof contents === "string") {
    await fs.writeFile(file, contents, "utf8");
  } else if (contents) {
    await fs.writeFile(file, JSON.stringify(contents), "utf8");
  }
  return file;
}

export async function removeTemp(file: string): Promise<void> {
  await fs.rm(path.dirname(file), { recursive: true, force: true });
}

/**
 * Logger whose calls can be read back per level, or across levels in call
 * order as `level: message` through `timeline`.
 */
export function recordingLogger() {
  const timeline: string[] = [];
  const record =
    (level: string) =>
    (...args: unknown[]) => {
      timeline.push(`${level}: ${args.map(String).join(" ")}`);
    };
  const logger = {
    log: vi.fn<(...args: unknown[]) => void>(record("log")),
    warn: vi.fn<(...args: unknown[]) => void>(record("warn")),
    error: vi.fn<(...args: unknown[]) => void>(record("error")),
    debug: vi.fn<(...args: unknown[]) => void>(record("debug")),
  } satisfies Logger;
  const lines = (level: keyof typeof logger) =>
    logger[level].mock.calls.map((args) => args.map(String).join(" "));
  return { logger, lines, timeline };
}

/** Topic that just remembers what was published. */
export class CapturingTopic implements BroadcastTopic {
  readonly published: Uint8Array[] = [];

  async publish(payload: Uint8Array): Promise<void> {
    this.published.push(payload);
  }

  json(index: number): unknown {
    return JSON.parse(new TextDecoder().decode(this.published[index]));
  }
}

/**
 * In-process stand-in for the gossipsub topic: every published payload goes
 * to every other member, tagged with the publisher's id.
 */
export class InMemoryHub {
  private members: Map<string, (payload: Uint8Array, from: string) => void> = new Map();

  join(peerId: string, deliver: (payload: Uint8Array, from: string) => void): BroadcastTopic {
    this.members.set(peerId, deliver);
    return {
      publish: async (payload) => {
        for (const [id, receive] of this.members) {
          if (id !== peerId) receive(payload, peerId);
        }
      },
    };
  }
}
