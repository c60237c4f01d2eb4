import { z } from "zod";
import { SongSchema } from "./CatalogStore.js";
import type {
  ChatMessage,
  Envelope,
  ListMode,
  ListRequest,
  ListResponse,
  NodeContext,
} from "./types.js";

// ---------- Wire schemas ----------
const ListModeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("all") }),
  z.object({ type: z.literal("one"), peer: z.string().min(1) }),
]);

const ListRequestSchema = z.object({ mode: ListModeSchema });

const ListResponseSchema = z.object({
  mode: ListModeSchema,
  data: z.array(SongSchema),
  receiver: z.string().min(1),
});

const ChatMessageSchema = z.object({ text: z.string() });

export const EnvelopeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("request"), payload: ListRequestSchema }),
  z.object({ kind: z.literal("response"), payload: ListResponseSchema }),
  z.object({ kind: z.literal("chat"), payload: ChatMessageSchema }),
]);

/**
 * Classification: What the local node should do with an inbound payload.
 *  - "request" / "response" / "chat": accepted and addressed to us
 *  - "ignored": well-formed but meant for someone else
 *  - "miss": not one of our envelopes at all
 */
export type Classification =
  | { kind: "request"; request: ListRequest }
  | { kind: "response"; response: ListResponse }
  | { kind: "chat"; message: ChatMessage }
  | { kind: "ignored"; reason: string }
  | { kind: "miss" };

export const ALL: ListMode = { type: "all" };

export function one(peer: string): ListMode {
  return { type: "one", peer };
}

export function encodeEnvelope(envelope: Envelope): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(envelope));
}

/** Parse bytes into an envelope, or `null` when they are not one. */
export function decodeEnvelope(bytes: Uint8Array): Envelope | null {
  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(bytes));
  } catch {
    return null;
  }
  const parsed = EnvelopeSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * Decide whether an inbound payload concerns this node. Responses count only
 * when we are the receiver; requests only when they target everyone or us.
 */
export function classify(bytes: Uint8Array, context: NodeContext): Classification {
  const envelope = decodeEnvelope(bytes);
  if (!envelope) {
    return { kind: "miss" };
  }

  switch (envelope.kind) {
    case "response":
      if (envelope.payload.receiver !== context.peerId) {
        return { kind: "ignored", reason: `response for ${envelope.payload.receiver}` };
      }
      return { kind: "response", response: envelope.payload };
    case "request": {
      const { mode } = envelope.payload;
      if (mode.type === "one" && mode.peer !== context.peerId) {
        return { kind: "ignored", reason: `request for ${mode.peer}` };
      }
      return { kind: "request", request: envelope.payload };
    }
    case "chat":
      return { kind: "chat", message: envelope.payload };
  }
}

export function describeMode(mode: ListMode): string {
  return mode.type === "all" ? "ALL" : `One(${mode.peer})`;
}
