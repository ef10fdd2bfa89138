import { createHash } from "node:crypto";
import fs from "node:fs";

/** MD5 of a file on disk, or undefined when the file does not exist. */
export async function md5File(filePath: string): Promise<string | undefined> {
  const hash = createHash("md5");
  try {
    for await (const chunk of fs.createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
  return hash.digest("hex");
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
