import type { NewSong } from "./CatalogStore.js";
import { CommandInputError } from "./errors.js";
import { ALL, one } from "./messages.js";
import type { ListMode } from "./types.js";

/**
 * Command: one parsed line of operator input.
 */
export type Command =
  | { type: "listPeers" }
  | { type: "listLocalSongs" }
  | { type: "listRemoteSongs"; mode: ListMode }
  | { type: "createSong"; song: NewSong | null }
  | { type: "deleteSong"; id: number }
  | { type: "publishSong"; id: number }
  | { type: "privateSong"; id: number }
  | { type: "chat"; text: string }
  | { type: "help" }
  | { type: "noop" };

export const COMMAND_HELP: ReadonlyArray<[string, string]> = [
  ["list peers", "show peers found by discovery"],
  ["list songs", "show the local catalog"],
  ["list songs all", "ask every peer for its public songs"],
  ["list songs <peer-id>", "ask one peer for its public songs"],
  ["create song", "add a song (prompts for each field)"],
  ["create song t|a|l|e", "add a song inline: title|artist|lyrics|explicit"],
  ["publish song <id>", "make a song visible to peers"],
  ["private song <id>", "hide a song from peers"],
  ["delete song <id>", "remove a song"],
  ["chat <message>", "send a message to everyone on the topic"],
  ["help", "show this list"],
];

/** Questions asked, in order, for an interactive `create song`. */
export const SONG_FIELD_PROMPTS = ["Title: ", "Artist: ", "Lyrics: ", "Explicit (yes/no): "] as const;

/**
 * True for a bare `create song`: the fields are collected from the lines
 * that follow it, before anything reaches the coordinator.
 */
export function opensSongForm(input: string): boolean {
  return input.trim() === "create song";
}

/**
 * Parse a line of operator input. Throws `CommandInputError` for unknown
 * commands and malformed arguments.
 */
export function parseCommand(input: string): Command {
  const line = input.trim();
  if (line === "") {
    return { type: "noop" };
  }
  if (line === "help") {
    return { type: "help" };
  }
  if (line === "list peers") {
    return { type: "listPeers" };
  }

  const listSongs = matchPrefix(line, "list songs");
  if (listSongs !== null) {
    if (listSongs === "") return { type: "listLocalSongs" };
    return { type: "listRemoteSongs", mode: listSongs === "all" ? ALL : one(listSongs) };
  }

  const create = matchPrefix(line, "create song");
  if (create !== null) {
    return { type: "createSong", song: create === "" ? null : parseInlineSong(create) };
  }

  const del = matchPrefix(line, "delete song");
  if (del !== null) {
    return { type: "deleteSong", id: parseSongId(del) };
  }

  const pub = matchPrefix(line, "publish song");
  if (pub !== null) {
    return { type: "publishSong", id: parseSongId(pub) };
  }

  const priv = matchPrefix(line, "private song");
  if (priv !== null) {
    return { type: "privateSong", id: parseSongId(priv) };
  }

  const chat = matchPrefix(line, "chat");
  if (chat !== null) {
    if (chat === "") {
      throw new CommandInputError("nothing to send - Format: chat <message>");
    }
    return { type: "chat", text: chat };
  }

  throw new CommandInputError(`unknown command: ${line}`);
}

/** Song ids are non-negative integers written in decimal. */
export function parseSongId(raw: string): number {
  const text = raw.trim();
  if (text === "") {
    throw new CommandInputError("missing song id");
  }
  if (!/^\d+$/.test(text)) {
    throw new CommandInputError(`invalid id: ${text}`);
  }
  const id = Number(text);
  if (!Number.isSafeInteger(id)) {
    throw new CommandInputError(`invalid id: ${text}`);
  }
  return id;
}

/**
 * Validate collected song fields. Title, artist and lyrics must be
 * non-empty; a missing explicit flag means "not explicit".
 */
export function buildNewSong(fields: string[]): NewSong {
  const [title = "", artist = "", lyrics = "", explicit = ""] = fields.map((f) => f.trim());
  if (title === "" || artist === "" || lyrics === "") {
    throw new CommandInputError("too few arguments - Format: title|artist|lyrics|explicit");
  }
  return { title, artist, lyrics, explicit };
}

function parseInlineSong(rest: string): NewSong {
  return buildNewSong(rest.split("|"));
}

/**
 * Returns the trimmed remainder when `line` is `keyword` alone or followed
 * by whitespace, otherwise null. "list songsX" does not match "list songs".
 */
function matchPrefix(line: string, keyword: string): string | null {
  if (line === keyword) {
    return "";
  }
  if (line.startsWith(keyword) && /\s/.test(line.charAt(keyword.length))) {
    return line.slice(keyword.length).trim();
  }
  return null;
}
