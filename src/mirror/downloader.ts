import fs from "node:fs/promises";
import { LocalIoError } from "../errors.js";
import type { RetryingFetcher } from "../remote/fetcher.js";
import type { DownloadOutcome, ImageContent } from "../types.js";
import { md5File } from "../utils/hash.js";

/**
 * Makes one local file match its remote record. The network is only touched
 * when the file is missing or its MD5 differs from the remote hash.
 */
export class ContentAddressedDownloader {
  constructor(private readonly fetcher: Pick<RetryingFetcher, "fetch">) {}

  async ensure(localPath: string, content: ImageContent): Promise<DownloadOutcome> {
    let localHash: string | undefined;
    try {
      localHash = await md5File(localPath);
    } catch (error) {
      return { status: "failed", error: new LocalIoError(localPath, "read", error) };
    }

    if (localHash !== undefined && localHash === content.hash.toLowerCase()) {
      return { status: "skipped" };
    }

    let bytes: Buffer;
    try {
      bytes = await this.fetcher.fetch(content.url);
    } catch (error) {
      return { status: "failed", error: error instanceof Error ? error : new Error(String(error)) };
    }

    // whole body is buffered, the file is written in one call
    try {
      await fs.writeFile(localPath, bytes);
    } catch (error) {
      return { status: "failed", error: new LocalIoError(localPath, "write", error) };
    }

    return { status: "downloaded", replaced: localHash !== undefined, sizeBytes: bytes.length };
  }
}
