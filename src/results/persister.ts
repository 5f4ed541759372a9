/**
 * Result persister
 *
 * One JSON file per participant: `<dir>/<user_id>_results.json`. A second
 * bundle for the same user_id replaces the first. Each write renames its
 * own temp file into place.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readdir, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { PersistFailureError } from "../domain/errors.js";
import type { ResultBundleT } from "../schemas/results.js";
import { log } from "../utils/telemetry.js";

export const RESULTS_FILE_SUFFIX = "_results.json";

export interface ResultPersister {
  /** @throws PersistFailureError */
  persist(bundle: ResultBundleT): Promise<string>;
  /** Number of bundles written so far */
  count(): Promise<number>;
}

/**
 * Reduce a user id to a safe file-name stem. Emails keep their shape;
 * separators and other characters become underscores.
 */
export function sanitizeUserId(userId: string): string {
  const cleaned = userId.trim().replace(/[^A-Za-z0-9._@+-]/g, "_").replace(/^\.+/, "_");
  return cleaned.length > 0 ? cleaned : "_";
}

export function resultsFileName(userId: string): string {
  return `${sanitizeUserId(userId)}${RESULTS_FILE_SUFFIX}`;
}

export class FileResultPersister implements ResultPersister {
  constructor(private readonly directory: string) {}

  async persist(bundle: ResultBundleT): Promise<string> {
    const filePath = join(this.directory, resultsFileName(bundle.user_id));
    const tempPath = `${filePath}.${randomUUID()}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, JSON.stringify(bundle, null, 2), "utf-8");
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        log.debug({ error: cleanupError }, "No temp results file to clean up");
      });
      log.error({ error, records: bundle.results.length }, "Failed to write result bundle");
      throw new PersistFailureError(bundle.user_id, error);
    }

    log.info({ records: bundle.results.length }, "Result bundle written");
    return filePath;
  }

  async count(): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return 0;
      }
      throw error;
    }
    return entries.filter((name) => name.endsWith(RESULTS_FILE_SUFFIX)).length;
  }
}
