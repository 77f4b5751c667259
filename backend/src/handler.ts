import type { AxiosInstance } from "axios";
import type { UpdaterConfig } from "./config.js";
import { UpdaterError } from "./errors.js";
import { fetchMeasurements, fetchMetadata } from "./mivXml.js";
import { cleanMeasurements, joinWithMetadata } from "./cleanData.js";
import { writeSnapshot, type WrittenSnapshot } from "./snapshot.js";

export interface UpdateDeps {
  /** HTTP client for both feeds; tests pass one with an in-process adapter. */
  client?: AxiosInstance;
  now?: () => Date;
}

/**
 * One run: fetch live data, clean it, fetch station metadata, join, write.
 * Both feeds are fetched before anything is written, so a failure leaves the previous files as they were.
 */
export async function runUpdate(config: UpdaterConfig, deps: UpdateDeps = {}): Promise<WrittenSnapshot> {
  const startMs = Date.now();

  const rawMeasurements = await fetchMeasurements(config, deps.client);
  const cleaned = cleanMeasurements(rawMeasurements);

  const metadata = await fetchMetadata(config, deps.client);
  const joined = joinWithMetadata(cleaned, metadata);

  const written = await writeSnapshot(joined, config, deps.now?.());
  console.log(`Wrote ${joined.size} measure point(s) to ${written.latestPath} and ${written.archivePath}.`);
  console.log("Update duration ms:", Date.now() - startMs);
  return written;
}

/** Failure line on stderr, once, where the run is caught. */
export function reportFailure(error: unknown): void {
  if (error instanceof UpdaterError) {
    console.error(`Update failed: ${error.message}`);
  } else {
    console.error("Error in updater:", error);
  }
}

/** Process exit code for one run: 0 on success, 1 on any failure. */
export async function run(config: UpdaterConfig, deps: UpdateDeps = {}): Promise<number> {
  try {
    await runUpdate(config, deps);
    console.log("Update finished successfully.");
    return 0;
  } catch (error) {
    reportFailure(error);
    return 1;
  }
}
