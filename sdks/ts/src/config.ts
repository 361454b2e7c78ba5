/**
 * Environment-sourced client configuration.
 * @module
 */

import { ValidationError } from "./errors.ts";

/** Client version, sent in the `User-Agent` header */
export const VERSION = "0.1.0";

/** Share of the idle-timeout hint used as the liveness probe period */
const PING_RATIO = 0.9;

/**
 * Resolved client configuration.
 */
export interface EsubConfig {
  /** Default token attached to every request */
  readonly token?: string;
  /** Scheme of one-shot requests (`ESUB_PROTOCOL`) */
  readonly protocol: string;
  /** Scheme of persistent sessions (`ESUB_WEBSOCKET_PROTOCOL`) */
  readonly wsProtocol: string;
  /** Server host (`ESUB_SERVICE_HOST`) */
  readonly host: string;
  /** Server port (`ESUB_SERVICE_PORT`) */
  readonly port: number;
  /** Retries of one-shot requests after a network failure */
  readonly retries: number;
  /** Confirmation Mode: acknowledge every delivered message */
  readonly confirm: boolean;
  /** Liveness probe period in milliseconds */
  readonly pingPeriodMs: number;
  /** `User-Agent` header value */
  readonly userAgent: string;
}

/** Environment variables the client reads. */
export type EsubEnv = Readonly<Record<string, string | undefined>>;

function parseInteger(
  env: EsubEnv,
  name: string,
  fallback: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(
      `${name} must be a non-negative integer, got "${raw}"`,
      name,
    );
  }
  return value;
}

/**
 * Read the configuration from environment variables.
 *
 * @example
 * ```typescript
 * const config = loadConfig({ ESUB_SERVICE_HOST: "esub.local" });
 * config.host; // "esub.local"
 * config.pingPeriodMs; // 54000
 * ```
 */
export function loadConfig(env: EsubEnv = process.env): EsubConfig {
  const confirmFlag = env.ESUB_CONFIRM_RECEIPT;
  const token = env.ESUB_TOKEN;

  return {
    token: token === undefined || token === "" ? undefined : token,
    protocol: env.ESUB_PROTOCOL || "http",
    wsProtocol: env.ESUB_WEBSOCKET_PROTOCOL || "ws",
    host: env.ESUB_SERVICE_HOST || "localhost",
    port: parseInteger(env, "ESUB_SERVICE_PORT", 8090),
    retries: parseInteger(env, "ESUB_REQUEST_RETRIES", 0),
    confirm: confirmFlag !== undefined && confirmFlag !== "" &&
      confirmFlag !== "0",
    pingPeriodMs: pingPeriodFromHint(
      parseInteger(env, "ESUB_PING_FREQUENCY", 60) || 60,
    ),
    userAgent: `esub ${VERSION}`,
  };
}

/**
 * Liveness probe period for an idle-timeout hint in seconds.
 */
export function pingPeriodFromHint(hintSeconds: number): number {
  return Math.round(hintSeconds * 1000 * PING_RATIO);
}
