import { randomBytes } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Write `content` to a temporary file beside `filePath`, then rename it into place.
 * Readers see either the old file or the new one, never a partial write.
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tmp = `${filePath}.tmp.${randomBytes(4).toString("hex")}`;
  await fs.mkdir(dir, { recursive: true });
  try {
    await fs.writeFile(tmp, content, "utf-8");
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWriteFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}

/** Parsed JSON from `filePath`, or `undefined` when the file does not exist. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new Error(`Corrupt JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
