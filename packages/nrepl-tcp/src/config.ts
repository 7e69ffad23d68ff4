// Server configuration.

import net from "node:net";

import { DEFAULT_MAX_FRAME_SIZE } from "./framing.ts";

/** Conventional nREPL port. */
export const DEFAULT_PORT = 5555;

/** Configuration for the server. */
export interface ServerConfig {
  /** Loopback interface to bind. */
  host: string;
  /** Port to bind; 0 picks a free one. */
  port: number;
  /** Largest request accepted on a connection, in bytes. */
  maxFrameSize: number;
}

/** Default server configuration. */
export function defaultServerConfig(): ServerConfig {
  return {
    host: "127.0.0.1",
    port: DEFAULT_PORT,
    maxFrameSize: DEFAULT_MAX_FRAME_SIZE,
  };
}

/** `localhost`, `::1` or an address in 127.0.0.0/8. */
export function isLoopbackHost(host: string): boolean {
  if (host === "localhost" || host === "::1") return true;
  return net.isIPv4(host) && host.startsWith("127.");
}

/**
 * Check that `host` is a loopback address.
 *
 * The server has no authentication, so it never listens on other interfaces.
 */
export function assertLoopbackHost(host: string): void {
  if (!isLoopbackHost(host)) {
    throw new Error(`Refusing to listen on ${host}: only loopback addresses are allowed`);
  }
}

function envInteger(env: NodeJS.ProcessEnv, name: string, max: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new Error(`${name} must be an integer between 0 and ${max}, got "${raw}"`);
  }
  return value;
}

/**
 * Read overrides from `NREPL_HOST`, `NREPL_PORT` and `NREPL_MAX_FRAME_SIZE`.
 *
 * Unset or empty variables are left out so they fall back to the defaults.
 * `NREPL_HOST` must name a loopback address.
 */
export function serverConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ServerConfig> {
  const config: Partial<ServerConfig> = {};

  const host = env.NREPL_HOST;
  if (host) {
    assertLoopbackHost(host);
    config.host = host;
  }

  const port = envInteger(env, "NREPL_PORT", 65535);
  if (port !== undefined) config.port = port;

  const maxFrameSize = envInteger(env, "NREPL_MAX_FRAME_SIZE", Number.MAX_SAFE_INTEGER);
  if (maxFrameSize !== undefined) config.maxFrameSize = maxFrameSize;

  return config;
}
