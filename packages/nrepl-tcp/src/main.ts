// nREPL server entry point.
//
// Configured from NREPL_HOST, NREPL_PORT and NREPL_MAX_FRAME_SIZE; set
// DEBUG=nrepl:* to log connections and requests to stderr.

import { loggingMiddleware } from "@nrepl-lite/core";

import { serverConfigFromEnv } from "./config.ts";
import { Server } from "./server.ts";

async function main() {
  const server = new Server(serverConfigFromEnv(), { middleware: [loggingMiddleware()] });
  const addr = await server.listen();
  console.error(`nREPL server listening on ${addr.address}:${addr.port}`);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (err) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
