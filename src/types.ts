export type TreeNode =
  | { kind: "Folder"; name: string; remoteId: string }
  | { kind: "Album"; name: string; remoteId: string; albumId: string }
  | { kind: "Unknown"; name: string; remoteId: string; rawType: string };

export interface ImageContent {
  hash: string;
  url: string;
}

export interface ImageRecord {
  remoteFileName: string;
  /** Absent when neither the archived fields nor the expansion table resolve. */
  content?: ImageContent;
}

export interface Page<T> {
  items: T[];
  pageStart: number;
  pageCount: number;
  totalCount: number;
}

export interface SequencedName {
  occurrencePrefix: string;
  localFileName: string;
}

export type DownloadOutcome =
  | { status: "skipped" }
  | { status: "downloaded"; replaced: boolean; sizeBytes: number }
  | { status: "failed"; error: Error };

export interface IncompleteNode {
  kind: "Folder" | "Album";
  id: string;
  path: string;
  reason: string;
}

export interface MirrorSummary {
  folders: number;
  albums: number;
  images: {
    downloaded: number;
    replaced: number;
    skipped: number;
    failed: number;
  };
  unexpectedNodes: number;
  incomplete: IncompleteNode[];
}
