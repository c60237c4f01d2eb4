import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { PassThrough } from "stream";
import { CatalogStore, Coordinator, PeerView } from "setlist-peer-protocol";
import type { BroadcastTopic } from "setlist-peer-protocol";
import { afterEach, describe, expect, it, vi } from "vitest";
import { OperatorConsole } from "../OperatorConsole.js";

function harness() {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on("data", (chunk: Buffer) => written.push(chunk.toString("utf8")));
  const operator = new OperatorConsole(input, output);
  const lines: string[] = [];
  const songs: string[][] = [];
  const onClose = vi.fn();
  const handlers = {
    onLine: (line: string) => lines.push(line),
    onSong: (fields: string[]) => songs.push(fields),
    onClose,
  };
  return { input, written, operator, lines, songs, onClose, handlers };
}

describe("OperatorConsole", () => {
  it("hands every line to the command callback", async () => {
    const { input, operator, lines, handlers } = harness();
    operator.start(handlers);

    input.write("list peers\nlist songs\n");

    await vi.waitFor(() => expect(lines).toEqual(["list peers", "list songs"]));
    operator.close();
  });

  it("collects a create song form from the lines that follow", async () => {
    const { input, written, operator, lines, songs, handlers } = harness();
    operator.start(handlers);

    input.write("create song\nBlue Train\nColtrane\nla la\nno\nlist songs\n");

    await vi.waitFor(() => {
      expect(songs).toEqual([["Blue Train", "Coltrane", "la la", "no"]]);
      expect(lines).toEqual(["list songs"]);
      expect(written.join("")).toBe("Title: Artist: Lyrics: Explicit (yes/no): ");
    });
    operator.close();
  });

  it("asks the next question only once the previous answer arrived", async () => {
    const { input, written, operator, songs, handlers } = harness();
    operator.start(handlers);

    input.write("  create song \n");
    await vi.waitFor(() => expect(written.join("")).toBe("Title: "));
    input.write("t\n");
    await vi.waitFor(() => expect(written.join("")).toBe("Title: Artist: "));

    expect(songs).toEqual([]);
    operator.close();
  });

  it("passes the inline create form through as a command", async () => {
    const { input, operator, lines, songs, handlers } = harness();
    operator.start(handlers);

    input.write("create song a|b|c|yes\n");

    await vi.waitFor(() => expect(lines).toEqual(["create song a|b|c|yes"]));
    expect(songs).toEqual([]);
    operator.close();
  });

  it("abandons an unfinished form when input ends", async () => {
    const { input, written, operator, songs, onClose, handlers } = harness();
    operator.start(handlers);

    input.end("create song\nonly a title\n");

    await vi.waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    expect(songs).toEqual([]);
    await vi.waitFor(() =>
      expect(written.join("")).toBe("Title: Artist: \ncreate song abandoned: input closed\n"),
    );
  });

  it("can only be started once", () => {
    const { operator, handlers } = harness();
    operator.start(handlers);
    expect(() => operator.start(handlers)).toThrow("OperatorConsole: already started");
    operator.close();
  });
});

describe("OperatorConsole feeding a Coordinator", () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it("creates a song typed ahead in one burst and keeps answering peers", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "setlist-cli-"));
    const file = path.join(dir, "songs.json");
    await fs.writeFile(file, "[]", "utf8");

    const published: unknown[] = [];
    const topic: BroadcastTopic = {
      publish: async (payload) => {
        published.push(JSON.parse(new TextDecoder().decode(payload)));
      },
    };
    const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const store = new CatalogStore(file);
    const coordinator = new Coordinator({
      context: { peerId: "peer-self", topic: "songs" },
      store,
      topic,
      peers: new PeerView(),
      logger,
    });
    const running = coordinator.run();

    const { input, operator } = harness();
    operator.start({
      onLine: (line) => coordinator.submitInput(line),
      onSong: (fields) => coordinator.submitSong(fields),
      onClose: () => undefined,
    });

    input.write("create song\nBlue Train\nColtrane\nla la\nno\npublish song 0\n");
    coordinator.receive(
      new TextEncoder().encode(JSON.stringify({ kind: "request", payload: { mode: { type: "all" } } })),
      "peer-b",
    );

    await vi.waitFor(async () => {
      expect(await store.load()).toEqual([
        { id: 0, title: "Blue Train", artist: "Coltrane", lyrics: "la la", explicit: "no", public: true },
      ]);
      expect(published).toHaveLength(1);
    });
    operator.close();
    await coordinator.stop();
    await running;

    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.log).toHaveBeenCalledWith("Created song #0: 0. Blue Train | Coltrane | la la");
  });
});
