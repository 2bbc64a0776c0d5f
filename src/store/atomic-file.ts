import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";

export const TEMP_SUFFIX = ".tmp";

/**
 * Write through a temporary file in `tempDir` and rename it over `target`.
 * Readers see either the old file or the complete new one.
 * `tempDir` must be on the same filesystem as `target`.
 */
export async function writeFileAtomic(
  tempDir: string,
  target: string,
  data: string
): Promise<void> {
  const temp = path.join(
    tempDir,
    `${path.basename(target)}.${randomUUID().slice(0, 8)}${TEMP_SUFFIX}`
  );

  const handle = await fs.open(temp, "w");
  try {
    await handle.writeFile(data, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fs.rename(temp, target);
  } catch (err) {
    await fs.rm(temp, { force: true });
    throw err;
  }
}

/**
 * Errors raised in another realm (a vm context, a test sandbox) fail
 * `instanceof Error`, so only the shape is checked
 */
export function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
  );
}
