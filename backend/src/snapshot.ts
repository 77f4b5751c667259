import { mkdir, writeFile } from "fs/promises";
import { dirname, join } from "path";
import type { UpdaterConfig } from "./config.js";
import type { JoinedRecord } from "./cleanData.js";

export interface Snapshot {
  /** Capture time, local ISO-8601 with explicit offset, e.g. 2026-10-18T14:57:03.120+02:00 */
  time: string;
  measure_points: Record<string, JoinedRecord>;
}

export interface WrittenSnapshot {
  snapshot: Snapshot;
  latestPath: string;
  archivePath: string;
}

/**
 * ISO-8601 in local time with a "+hh:mm" offset instead of "Z".
 * offsetMinutes is east of UTC (Europe/Brussels summer time = 120).
 */
export function formatOffsetTimestamp(date: Date, offsetMinutes: number = -date.getTimezoneOffset()): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  const hh = String(Math.floor(abs / 60)).padStart(2, "0");
  const mm = String(abs % 60).padStart(2, "0");
  return `${shifted.toISOString().slice(0, 23)}${sign}${hh}:${mm}`;
}

/** Archive file name for a capture time; ":" is not allowed in file names everywhere. */
export function archiveFileName(time: string): string {
  return `${time.replace(/:/g, "-")}.json`;
}

export function buildSnapshot(measurePoints: Map<number, JoinedRecord>, time: string): Snapshot {
  const points: Record<string, JoinedRecord> = {};
  for (const [sensorId, record] of measurePoints) {
    points[String(sensorId)] = record;
  }
  return { time, measure_points: points };
}

/**
 * Write the "most recent" file (overwritten every run) and one archive file per run.
 * The capture time is taken once and used for both the payload and the archive name.
 */
export async function writeSnapshot(
  measurePoints: Map<number, JoinedRecord>,
  config: Pick<UpdaterConfig, "latestOutputPath" | "archiveDirectory">,
  now: Date = new Date()
): Promise<WrittenSnapshot> {
  const time = formatOffsetTimestamp(now);
  const snapshot = buildSnapshot(measurePoints, time);
  const body = JSON.stringify(snapshot);

  await mkdir(dirname(config.latestOutputPath), { recursive: true });
  await writeFile(config.latestOutputPath, body, "utf8");

  await mkdir(config.archiveDirectory, { recursive: true });
  const archivePath = join(config.archiveDirectory, archiveFileName(time));
  await writeFile(archivePath, body, "utf8");

  return { snapshot, latestPath: config.latestOutputPath, archivePath };
}
