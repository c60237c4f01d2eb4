export { Setlist } from "./Setlist.js";
export { senderOf } from "./Setlist.js";
export type { SetlistLibp2p, TopicMessage } from "./Setlist.js";
export { Coordinator, formatSong } from "./Coordinator.js";
export type { CoordinatorOptions } from "./Coordinator.js";
export { CatalogStore, CatalogSchema, SongSchema, isExplicit } from "./CatalogStore.js";
export type { NewSong } from "./CatalogStore.js";
export { ResponseProducer } from "./ResponseProducer.js";
export type { ResponseSink } from "./ResponseProducer.js";
export { PeerView } from "./PeerView.js";
export type { LivenessCheck } from "./PeerView.js";
export { Mailbox } from "./Mailbox.js";
export {
  ALL,
  one,
  classify,
  decodeEnvelope,
  encodeEnvelope,
  describeMode,
  EnvelopeSchema,
} from "./messages.js";
export type { Classification } from "./messages.js";
export {
  parseCommand,
  parseSongId,
  buildNewSong,
  opensSongForm,
  COMMAND_HELP,
  SONG_FIELD_PROMPTS,
} from "./commands.js";
export type { Command } from "./commands.js";
export {
  SetlistError,
  PersistenceError,
  CommandInputError,
  StartupFatalError,
  errorMessage,
} from "./errors.js";
export type * from "./types.js";
