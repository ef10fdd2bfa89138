import fs from "node:fs/promises";
import path from "node:path";
import { LocalIoError, MirrorError, PageRetriesExhaustedError, UnexpectedNodeTypeError, UnresolvedContentError } from "../errors.js";
import type { Logger } from "../logger.js";
import { FIRST_PAGE_START, UNKNOWN_TOTAL, type PagedTreeClient } from "../remote/client.js";
import type { ImageRecord, MirrorSummary, Page, TreeNode } from "../types.js";
import { toPathSegment } from "../utils/paths.js";
import { sleep as defaultSleep } from "../utils/sleep.js";
import type { ContentAddressedDownloader } from "./downloader.js";
import type { ProgressReporter, ProgressTask } from "./progress.js";
import { SessionSequencer } from "./sequencer.js";

export interface TreeWalkerOptions {
  /** Failed attempts allowed for a single page before its node is abandoned; 0 means no limit. */
  pageRetryLimit?: number;
  pageRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface ListingTarget {
  kind: "Folder" | "Album";
  id: string;
  dir: string;
}

/**
 * Depth-first mirror of a folder tree. One node is processed at a time; a page
 * that fails is requested again at the same cursor, never skipped.
 */
export class TreeWalker {
  private readonly pageRetryLimit: number;
  private readonly pageRetryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly client: Pick<PagedTreeClient, "listFolderChildren" | "listAlbumImages">,
    private readonly downloader: Pick<ContentAddressedDownloader, "ensure">,
    private readonly logger: Logger,
    private readonly progress: ProgressReporter,
    options: TreeWalkerOptions = {}
  ) {
    this.pageRetryLimit = options.pageRetryLimit ?? 0;
    this.pageRetryDelayMs = options.pageRetryDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async mirror(rootNodeId: string, rootDir: string): Promise<MirrorSummary> {
    const summary: MirrorSummary = {
      folders: 0,
      albums: 0,
      images: { downloaded: 0, replaced: 0, skipped: 0, failed: 0 },
      unexpectedNodes: 0,
      incomplete: []
    };

    try {
      await fs.mkdir(rootDir, { recursive: true });
    } catch (error) {
      throw new LocalIoError(rootDir, "mkdir", error);
    }

    await this.walkFolder(rootNodeId, rootDir, summary);
    return summary;
  }

  private async walkFolder(nodeId: string, dir: string, summary: MirrorSummary): Promise<void> {
    summary.folders += 1;
    this.logger.info({ nodeId, path: dir }, "Listing folder");

    const target: ListingTarget = { kind: "Folder", id: nodeId, dir };
    try {
      for await (const page of this.pages(target, (start) => this.client.listFolderChildren(nodeId, start))) {
        for (const node of page.items) {
          await this.visitChild(node, dir, summary);
        }
      }
    } catch (error) {
      this.recordIncomplete(target, error, summary);
    }
  }

  private async visitChild(node: TreeNode, dir: string, summary: MirrorSummary): Promise<void> {
    if (node.kind === "Unknown") {
      summary.unexpectedNodes += 1;
      const error = new UnexpectedNodeTypeError(node.remoteId, node.rawType);
      this.logger.warn({ err: error, name: node.name, parent: dir }, "Skipping node of unexpected type");
      return;
    }

    const childDir = path.join(dir, toPathSegment(node.name));
    try {
      await fs.mkdir(childDir, { recursive: true });
    } catch (error) {
      this.logger.error({ err: new LocalIoError(childDir, "mkdir", error), nodeId: node.remoteId }, "Skipping node");
      return;
    }

    if (node.kind === "Folder") {
      await this.walkFolder(node.remoteId, childDir, summary);
    } else {
      await this.walkAlbum(node.albumId, childDir, summary);
    }
  }

  private async walkAlbum(albumId: string, dir: string, summary: MirrorSummary): Promise<void> {
    summary.albums += 1;
    this.logger.info({ albumId, path: dir }, "Listing album");

    const target: ListingTarget = { kind: "Album", id: albumId, dir };
    const sequencer = new SessionSequencer();
    let task: ProgressTask | undefined;

    try {
      for await (const page of this.pages(target, (start) => this.client.listAlbumImages(albumId, start))) {
        if (!task) task = this.progress.start(dir, page.totalCount);
        for (const image of page.items) {
          await this.mirrorImage(image, dir, sequencer, summary);
          task.increment();
        }
      }
    } catch (error) {
      this.recordIncomplete(target, error, summary);
    } finally {
      task?.finish();
    }
  }

  private async mirrorImage(
    image: ImageRecord,
    dir: string,
    sequencer: SessionSequencer,
    summary: MirrorSummary
  ): Promise<void> {
    // names are cleaned before sequencing so two remote names never share one local file
    const { localFileName } = sequencer.assign(toPathSegment(image.remoteFileName));
    const localPath = path.join(dir, localFileName);

    if (!image.content) {
      summary.images.failed += 1;
      this.logger.error({ err: new UnresolvedContentError(image.remoteFileName), path: localPath }, "Skipping image");
      return;
    }

    const outcome = await this.downloader.ensure(localPath, image.content);
    switch (outcome.status) {
      case "skipped":
        summary.images.skipped += 1;
        this.logger.debug({ path: localPath }, "Up to date");
        break;
      case "downloaded":
        summary.images.downloaded += 1;
        if (outcome.replaced) {
          summary.images.replaced += 1;
          this.logger.info({ path: localPath }, "Hash mismatch for existing file, downloaded again");
        } else {
          this.logger.debug({ path: localPath, sizeBytes: outcome.sizeBytes }, "Downloaded");
        }
        break;
      case "failed":
        summary.images.failed += 1;
        this.logger.error({ err: outcome.error, path: localPath, url: image.content.url }, "Image failed");
        break;
    }
  }

  /**
   * Yields the pages of one listing. The first page's total decides when the
   * listing ends; a failed page is requested again at the same cursor.
   */
  private async *pages<T>(target: ListingTarget, fetchPage: (start: number) => Promise<Page<T>>): AsyncGenerator<Page<T>> {
    let start = FIRST_PAGE_START;
    let total = UNKNOWN_TOTAL;
    let failures = 0;

    // cursors are 1-based: the listing is exhausted once start - 1 items were consumed
    while (start - FIRST_PAGE_START < total) {
      let page: Page<T>;
      try {
        page = await fetchPage(start);
      } catch (error) {
        if (!(error instanceof MirrorError)) throw error;
        failures += 1;
        this.logger.error({ err: error, start, attempt: failures, path: target.dir }, "Page fetch failed, retrying same page");
        if (this.pageRetryLimit > 0 && failures >= this.pageRetryLimit) {
          throw new PageRetriesExhaustedError(start, failures, error);
        }
        await this.sleep(this.pageRetryDelayMs);
        continue;
      }

      failures = 0;
      if (total === UNKNOWN_TOTAL) total = page.totalCount;
      yield page;

      if (page.pageCount === 0) {
        if (start - FIRST_PAGE_START < total) {
          this.logger.warn({ start, total, path: target.dir }, "Empty page before reported total, ending listing");
        }
        break;
      }
      start += page.pageCount;
    }
  }

  private recordIncomplete(target: ListingTarget, error: unknown, summary: MirrorSummary): void {
    if (!(error instanceof PageRetriesExhaustedError)) throw error;
    summary.incomplete.push({ kind: target.kind, id: target.id, path: target.dir, reason: error.message });
    this.logger.error({ err: error, kind: target.kind, id: target.id, path: target.dir }, "Listing abandoned");
  }
}
