#!/usr/bin/env node
import "dotenv/config";
import {
  ConfigError,
  USAGE,
  VERSION,
  formatAddress,
  loadConfig,
} from "./config/config.js";
import { createServer } from "./server.js";

async function main() {
  const command = await loadConfig(process.argv.slice(2));

  if (command.action === "help") {
    console.log(USAGE);
    return;
  }
  if (command.action === "version") {
    console.log(`serveit ${VERSION}`);
    return;
  }

  const { config } = command;
  const app = createServer(config);

  try {
    await app.listen({ host: config.interface, port: config.port });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(
      `failed to bind ${formatAddress(config.interface, config.port)}: ${reason}`,
    );
  }

  // Port 0 binds an ephemeral port; report the one we got
  const address = app.server.address();
  const port = address !== null && typeof address === "object" ? address.port : config.port;
  console.log(`Serving: ${config.root}`);
  console.log(`Listening on: http://${formatAddress(config.interface, port)}`);

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down...`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}\n\n${USAGE}`);
  } else {
    console.error("Failed to start server:", err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
