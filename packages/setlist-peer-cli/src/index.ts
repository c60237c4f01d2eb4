// packages/setlist-peer-cli/src/index.ts

import { Command } from "commander";
import path from "path";
import { CatalogStore, errorMessage } from "setlist-peer-protocol";
import { DEFAULT_CATALOG_PATH, resolveConfig, type StartOptions } from "./config.js";
import { NodeManager } from "./NodeManager.js";

const program = new Command();

program
  .name("setlist-peer")
  .description("Setlist Peer – share song catalogs over a libp2p broadcast topic")
  .version("1.0.0");

/**
 * `init`: create an empty catalog file. The node never creates one on its
 * own, so this is the first thing to run on a new machine.
 */
program
  .command("init")
  .description("Create an empty song catalog")
  .option("-c, --catalog <path>", "Catalog file", process.env.SETLIST_CATALOG ?? DEFAULT_CATALOG_PATH)
  .action(async (options: { catalog: string }) => {
    const resolvedPath = path.resolve(options.catalog);
    try {
      const created = await new CatalogStore(resolvedPath).init();
      if (created) {
        console.log(`✅ Created empty catalog at ${resolvedPath}`);
      } else {
        console.log(`ℹ️  Catalog already exists at ${resolvedPath}`);
      }
    } catch (err) {
      console.error(`❌ Init failed: ${errorMessage(err)}`);
      process.exit(1);
    }
  });

/**
 * `start`: join the topic and read commands from stdin until EOF or SIGINT.
 *   -c, --catalog <path>        catalog file (default ./songs.json)
 *   -t, --topic <name>          broadcast topic
 *   -l, --listen <addr...>      libp2p listen multiaddrs
 *   -p, --peer <addr...>        peers to dial at startup
 *   --no-mdns                   disable local peer discovery
 */
program
  .command("start")
  .description("Start a Setlist Peer node")
  .option("-c, --catalog <path>", "Catalog file")
  .option("-t, --topic <name>", "Broadcast topic shared by all peers")
  .option("-l, --listen <addr...>", "Listen multiaddrs")
  .option("-p, --peer <addr...>", "Peer multiaddrs to dial on startup")
  .option("--no-mdns", "Disable mDNS peer discovery")
  .action(async (options: StartOptions) => {
    console.log("🎵 Starting Setlist Peer node...");
    const manager = new NodeManager();

    const shutdown = (code: number) => {
      manager.stop().then(
        () => process.exit(code),
        (err: unknown) => {
          console.error(`❌ Shutdown failed: ${errorMessage(err)}`);
          process.exit(1);
        },
      );
    };

    try {
      const config = resolveConfig(options);
      await manager.start(config, () => shutdown(0));
    } catch (err) {
      console.error(`❌ Failed to start node: ${errorMessage(err)}`);
      process.exit(1);
    }

    console.log("✅ Node started successfully!");
    console.log(`📋 Peer Id: ${manager.getNodeId()}`);
    console.log("Type 'help' for the list of commands.");

    process.on("SIGINT", () => {
      console.log("\n🛑 Shutting down...");
      shutdown(0);
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
});
