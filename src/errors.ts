export type MirrorErrorKind =
  | "transport"
  | "upstream_rejected"
  | "upstream_unavailable"
  | "decode"
  | "unresolved_content"
  | "io"
  | "unexpected_node_type"
  | "page_retries_exhausted"
  | "config";

export abstract class MirrorError extends Error {
  abstract readonly kind: MirrorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The request never produced a response (DNS, refused connection, reset). */
export class TransportError extends MirrorError {
  readonly kind = "transport";

  constructor(readonly url: string, cause: unknown) {
    super(`Request to ${url} failed before a response: ${describeCause(cause)}`, { cause });
  }
}

export class UpstreamRejectedError extends MirrorError {
  readonly kind = "upstream_rejected";

  constructor(readonly url: string, readonly status: number) {
    super(`Upstream rejected ${url} with status ${status}`);
  }
}

export class UpstreamUnavailableError extends MirrorError {
  readonly kind = "upstream_unavailable";

  constructor(readonly url: string, readonly status: number, readonly attempts: number) {
    super(`Upstream unavailable for ${url} after ${attempts} attempts (last status ${status})`);
  }
}

export class DecodeError extends MirrorError {
  readonly kind = "decode";

  constructor(readonly url: string, detail: string, cause?: unknown) {
    super(`Unable to decode page at ${url}: ${detail}`, { cause });
  }
}

export class UnresolvedContentError extends MirrorError {
  readonly kind = "unresolved_content";

  constructor(readonly fileName: string) {
    super(`No content hash/url could be resolved for ${fileName}`);
  }
}

export class LocalIoError extends MirrorError {
  readonly kind = "io";

  constructor(readonly path: string, action: "read" | "write" | "mkdir", cause: unknown) {
    super(`Cannot ${action} ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class UnexpectedNodeTypeError extends MirrorError {
  readonly kind = "unexpected_node_type";

  constructor(readonly nodeId: string, readonly rawType: string) {
    super(`Unexpected node type "${rawType}" for node ${nodeId}`);
  }
}

export class PageRetriesExhaustedError extends MirrorError {
  readonly kind = "page_retries_exhausted";

  constructor(readonly start: number, readonly attempts: number, readonly lastError: unknown) {
    super(`Page at start=${start} still failing after ${attempts} attempts: ${describeCause(lastError)}`, {
      cause: lastError
    });
  }
}

export class ConfigError extends MirrorError {
  readonly kind = "config";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
