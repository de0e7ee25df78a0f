import { DEFAULT_LOG_LIMIT } from "./telegram-log.js";
import { DEFAULT_DEVICE_ID, DEFAULT_HOST_ID, DEFAULT_LIFE_INTERVAL_S } from "./simulator.js";

export interface Config {
  httpPort: number;
  /** Connect here at start-up when set. */
  plcHost: string | null;
  plcPort: number;
  deviceId: string;
  hostId: string;
  autoLife: boolean;
  lifeIntervalSeconds: number;
  autoConfirm: boolean;
  connectTimeoutMs: number;
  logLimit: number;
  simHost: string;
  simPort: number;
}

type Env = Record<string, string | undefined>;

function int(env: Env, name: string, fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Invalid ${name}: "${raw}" (expected an integer between ${min} and ${max})`);
  }
  return value;
}

function bool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new Error(`Invalid ${name}: "${raw}" (expected true or false)`);
}

function str(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

/**
 * Reads settings from the environment. `.env` is loaded by the entry point
 * through dotenv before this runs.
 */
export function loadConfig(env: Env = process.env): Config {
  return {
    httpPort: int(env, "HTTP_PORT", 3000, 1, 65535),
    plcHost: env.PLC_HOST?.trim() || null,
    plcPort: int(env, "PLC_PORT", 5000, 1, 65535),
    deviceId: str(env, "DEVICE_ID", DEFAULT_DEVICE_ID),
    hostId: str(env, "HOST_ID", DEFAULT_HOST_ID),
    autoLife: bool(env, "AUTO_LIFE", false),
    lifeIntervalSeconds: int(env, "LIFE_INTERVAL", DEFAULT_LIFE_INTERVAL_S),
    autoConfirm: bool(env, "AUTO_CONFIRM", true),
    connectTimeoutMs: int(env, "CONNECT_TIMEOUT_MS", 5000),
    logLimit: int(env, "LOG_LIMIT", DEFAULT_LOG_LIMIT),
    simHost: str(env, "SIM_HOST", "127.0.0.1"),
    simPort: int(env, "SIM_PORT", 5000, 1, 65535),
  };
}
