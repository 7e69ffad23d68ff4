// @nrepl-lite/tcp - TCP transport, server and client
//
// Node.js only: built on node:net.

export { BencodeFramed, DEFAULT_MAX_FRAME_SIZE } from "./framing.ts";
export {
  type ServerConfig,
  DEFAULT_PORT,
  defaultServerConfig,
  isLoopbackHost,
  assertLoopbackHost,
  serverConfigFromEnv,
} from "./config.ts";
export { type ServerOptions, Server } from "./server.ts";
export { type ServerAddress, type CloneResult, Client } from "./client.ts";
