/**
 * All-or-nothing file writes: content goes to a sibling temp file that is
 * renamed over the destination only once it is complete
 */

import crypto from "crypto";
import { mkdir, rename, rm } from "fs/promises";
import { basename, dirname, join } from "path";
import { logger } from "./logger.js";

/**
 * @param destinationPath - Final file path
 * @param write - Writes the full content to the temp path it is given
 */
export async function writeAtomically(
  destinationPath: string,
  write: (tempPath: string) => Promise<void>,
): Promise<void> {
  const directory = dirname(destinationPath);
  await mkdir(directory, { recursive: true });

  const tempPath = join(
    directory,
    `.${basename(destinationPath)}.${crypto.randomBytes(6).toString("hex")}.tmp`,
  );

  try {
    await write(tempPath);
    await rename(tempPath, destinationPath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn("Failed to remove temp file", {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}
