import type { NodeConfig } from "setlist-peer-protocol";

export const DEFAULT_CATALOG_PATH = "./songs.json";
export const DEFAULT_TOPIC = "setlist/songs/1.0.0";
export const DEFAULT_LISTEN = ["/ip4/0.0.0.0/tcp/0"];

/**
 * StartOptions: what commander hands to the `start` action.
 * `mdns` is false when `--no-mdns` was given.
 */
export interface StartOptions {
  catalog?: string;
  topic?: string;
  listen?: string[];
  peer?: string[];
  mdns?: boolean;
}

/**
 * Flags win over environment variables (SETLIST_CATALOG, SETLIST_TOPIC),
 * which win over defaults.
 */
export function resolveConfig(
  options: StartOptions,
  env: NodeJS.ProcessEnv = process.env,
): NodeConfig {
  const topic = (options.topic ?? env.SETLIST_TOPIC ?? DEFAULT_TOPIC).trim();
  if (topic === "") {
    throw new Error("topic must not be empty");
  }
  return {
    catalogPath: options.catalog ?? env.SETLIST_CATALOG ?? DEFAULT_CATALOG_PATH,
    topic,
    listen: options.listen && options.listen.length > 0 ? options.listen : DEFAULT_LISTEN,
    peers: options.peer ?? [],
    enableMdns: options.mdns !== false,
  };
}
