// Display client settings, read from the environment.

import { DEFAULT_RECEIVER_CONFIG, type ReceiverConfig } from "./client-receiver.js";

export const DEFAULT_CONNECT_TIMEOUT_MS = 3000;

export interface ClientSettings {
  host: string;
  port: number;
  width: number;
  height: number;
  connectTimeoutMs: number;
  statsIntervalMs: number;
  receiver: ReceiverConfig;
}

export type ClientSettingsResult = { ok: true; settings: ClientSettings } | { ok: false; errors: string[] };

export function readClientSettings(env: NodeJS.ProcessEnv): ClientSettingsResult {
  const errors: string[] = [];

  const int = (name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      errors.push(`${name} must be a non-negative integer, got "${raw}"`);
      return fallback;
    }
    return value;
  };

  const settings: ClientSettings = {
    host: env.RELAY_HOST || "127.0.0.1",
    port: int("RELAY_PORT", 8888),
    width: int("CLIENT_WIDTH", 320),
    height: int("CLIENT_HEIGHT", 240),
    connectTimeoutMs: int("CLIENT_CONNECT_TIMEOUT_MS", DEFAULT_CONNECT_TIMEOUT_MS),
    statsIntervalMs: int("CLIENT_STATS_INTERVAL_MS", 5000),
    receiver: {
      bufferCapacity: int("CLIENT_BUFFER_SIZE", DEFAULT_RECEIVER_CONFIG.bufferCapacity),
      headerTimeoutMs: int("CLIENT_HEADER_TIMEOUT_MS", DEFAULT_RECEIVER_CONFIG.headerTimeoutMs),
      payloadTimeoutMs: int("CLIENT_PAYLOAD_TIMEOUT_MS", DEFAULT_RECEIVER_CONFIG.payloadTimeoutMs),
      discardTimeoutMs: int("CLIENT_DISCARD_TIMEOUT_MS", DEFAULT_RECEIVER_CONFIG.discardTimeoutMs),
      retryDelayMs: int("CLIENT_RETRY_DELAY_MS", DEFAULT_RECEIVER_CONFIG.retryDelayMs),
      cooldownMs: int("CLIENT_COOLDOWN_MS", DEFAULT_RECEIVER_CONFIG.cooldownMs),
      maxConnectionFailures: int("CLIENT_MAX_FAILURES", DEFAULT_RECEIVER_CONFIG.maxConnectionFailures),
    },
  };

  return errors.length > 0 ? { ok: false, errors } : { ok: true, settings };
}
