import { resolve } from "path";
import { ConfigError } from "./errors.js";

/** Belgian MIV open data (Flemish traffic centre), live loop-detector readings. */
const DEFAULT_MEASUREMENT_FEED_URL = "http://miv.opendata.belfla.be/miv/verkeersdata";
/** Same source, station configuration (names, lanes, WGS84 coordinates). */
const DEFAULT_METADATA_FEED_URL = "http://miv.opendata.belfla.be/miv/configuratie/xml";
/** klasse_id 2 = passenger cars. */
const DEFAULT_MEASUREMENT_CLASS_ID = "2";
const DEFAULT_LATEST_OUTPUT_PATH = "data/most_recent_data.json";
const DEFAULT_ARCHIVE_DIRECTORY = "data/old_data";
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000; // 1 min per feed

export interface UpdaterConfig {
  measurementFeedUrl: string;
  metadataFeedUrl: string;
  measurementClassId: string;
  latestOutputPath: string;
  archiveDirectory: string;
  requestTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function envString(env: Env, key: string, fallback: string): string {
  return env[key]?.trim() || fallback;
}

function envTimeout(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer (milliseconds), got "${raw}"`);
  }
  return value;
}

/**
 * Settings come from the environment so the same build runs under cron, CI or by hand.
 * Output paths are resolved against the working directory.
 */
export function loadConfig(env: Env = process.env): UpdaterConfig {
  return {
    measurementFeedUrl: envString(env, "MEASUREMENT_FEED_URL", DEFAULT_MEASUREMENT_FEED_URL),
    metadataFeedUrl: envString(env, "METADATA_FEED_URL", DEFAULT_METADATA_FEED_URL),
    measurementClassId: envString(env, "MEASUREMENT_CLASS_ID", DEFAULT_MEASUREMENT_CLASS_ID),
    latestOutputPath: resolve(envString(env, "LATEST_OUTPUT_PATH", DEFAULT_LATEST_OUTPUT_PATH)),
    archiveDirectory: resolve(envString(env, "ARCHIVE_DIRECTORY", DEFAULT_ARCHIVE_DIRECTORY)),
    requestTimeoutMs: envTimeout(env, "REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS),
  };
}
