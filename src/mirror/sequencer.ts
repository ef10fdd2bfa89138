import type { SequencedName } from "../types.js";

const NUMBERED_NAME = /^([^0-9]*)([0-9]+).jpg$/;
const JPG_SUFFIX = ".jpg";

interface SessionState {
  occurrenceCount: number;
  seenIndexes: Set<bigint>;
}

export interface ParsedFileName {
  sessionKey: string;
  index: bigint;
}

/**
 * `IMG_0012.jpg` -> key `IMG_`, index 12. Names without a trailing number form
 * their own session with index 0, so every repeat of such a name opens a new
 * occurrence.
 */
export function parseFileName(fileName: string): ParsedFileName {
  const match = NUMBERED_NAME.exec(fileName);
  if (match) {
    return { sessionKey: match[1] ?? "", index: BigInt(match[2] ?? "0") };
  }

  const sessionKey = fileName.endsWith(JPG_SUFFIX) ? fileName.slice(0, -JPG_SUFFIX.length) : fileName;
  return { sessionKey, index: 0n };
}

/**
 * Reconstructs shoot boundaries inside one album: a file index seen twice for
 * the same session key means a new occurrence of that session started. Create
 * one instance per album.
 */
export class SessionSequencer {
  private readonly sessions = new Map<string, SessionState>();

  assign(remoteFileName: string): SequencedName {
    const { sessionKey, index } = parseFileName(remoteFileName);

    let session = this.sessions.get(sessionKey);
    if (!session) {
      session = { occurrenceCount: 0, seenIndexes: new Set() };
      this.sessions.set(sessionKey, session);
    }

    if (session.seenIndexes.has(index)) {
      session.occurrenceCount += 1;
      session.seenIndexes = new Set([index]);
    } else {
      session.seenIndexes.add(index);
    }

    const occurrencePrefix = String(session.occurrenceCount).padStart(2, "0");
    return { occurrencePrefix, localFileName: `${occurrencePrefix}_${remoteFileName}` };
  }
}
