import { describe, expect, it } from "vitest";
import { buildNewSong, opensSongForm, parseCommand, parseSongId } from "../commands.js";
import { CommandInputError } from "../errors.js";

describe("parseCommand", () => {
  it("recognises the list commands", () => {
    expect(parseCommand("list peers")).toEqual({ type: "listPeers" });
    expect(parseCommand("list songs")).toEqual({ type: "listLocalSongs" });
    expect(parseCommand("list songs all")).toEqual({
      type: "listRemoteSongs",
      mode: { type: "all" },
    });
    expect(parseCommand("list songs 12D3KooWabc")).toEqual({
      type: "listRemoteSongs",
      mode: { type: "one", peer: "12D3KooWabc" },
    });
  });

  it("trims surrounding whitespace", () => {
    expect(parseCommand("   list songs   ")).toEqual({ type: "listLocalSongs" });
    expect(parseCommand("\tpublish song 3 ")).toEqual({ type: "publishSong", id: 3 });
  });

  it("is case-sensitive", () => {
    expect(() => parseCommand("LIST PEERS")).toThrow(CommandInputError);
  });

  it("does not treat a longer word as the keyword", () => {
    expect(() => parseCommand("list songsall")).toThrow("unknown command: list songsall");
  });

  it("parses the id commands", () => {
    expect(parseCommand("delete song 0")).toEqual({ type: "deleteSong", id: 0 });
    expect(parseCommand("publish song 12")).toEqual({ type: "publishSong", id: 12 });
    expect(parseCommand("private song 7")).toEqual({ type: "privateSong", id: 7 });
  });

  it("rejects bad ids", () => {
    expect(() => parseCommand("delete song abc")).toThrow("invalid id: abc");
    expect(() => parseCommand("publish song -1")).toThrow("invalid id: -1");
    expect(() => parseCommand("private song")).toThrow("missing song id");
  });

  it("splits the inline create form", () => {
    expect(parseCommand("create song Title|Artist|Some lyrics|yes")).toEqual({
      type: "createSong",
      song: { title: "Title", artist: "Artist", lyrics: "Some lyrics", explicit: "yes" },
    });
  });

  it("asks for fields when create has no arguments", () => {
    expect(parseCommand("create song")).toEqual({ type: "createSong", song: null });
  });

  it("rejects an inline create with too few fields", () => {
    expect(() => parseCommand("create song Title|Artist")).toThrow(
      "too few arguments - Format: title|artist|lyrics|explicit",
    );
  });

  it("parses chat", () => {
    expect(parseCommand("chat hello   there")).toEqual({ type: "chat", text: "hello   there" });
    expect(() => parseCommand("chat")).toThrow("nothing to send - Format: chat <message>");
  });

  it("ignores blank lines and knows help", () => {
    expect(parseCommand("   ")).toEqual({ type: "noop" });
    expect(parseCommand("help")).toEqual({ type: "help" });
  });

  it("reports unknown commands", () => {
    expect(() => parseCommand("dance")).toThrow("unknown command: dance");
  });
});

describe("opensSongForm", () => {
  it("is true only for a bare create song", () => {
    expect(opensSongForm("create song")).toBe(true);
    expect(opensSongForm("  create song\t")).toBe(true);
    expect(opensSongForm("create song a|b|c|no")).toBe(false);
    expect(opensSongForm("create songs")).toBe(false);
  });
});

describe("parseSongId", () => {
  it("rejects ids beyond the safe integer range", () => {
    expect(() => parseSongId("99999999999999999999")).toThrow(CommandInputError);
  });
});

describe("buildNewSong", () => {
  it("defaults the explicit flag to empty", () => {
    expect(buildNewSong(["t", "a", "l"])).toEqual({
      title: "t",
      artist: "a",
      lyrics: "l",
      explicit: "",
    });
  });

  it("rejects blank required fields", () => {
    expect(() => buildNewSong(["t", "  ", "l", "yes"])).toThrow(CommandInputError);
  });
});
