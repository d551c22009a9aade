export type SyncErrorCode = "auth" | "fetch" | "parse" | "transfer" | "target_directory";

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class AuthError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("auth", message, options);
  }
}

export class FetchError extends SyncError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super("fetch", message, options);
    this.url = url;
    this.status = status;
  }
}

export class ParseError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("parse", message, options);
  }
}

export class TransferError extends SyncError {
  readonly url: string;
  readonly targetPath: string;

  constructor(message: string, url: string, targetPath: string, options?: { cause?: unknown }) {
    super("transfer", message, options);
    this.url = url;
    this.targetPath = targetPath;
  }
}

export class TargetDirectoryError extends SyncError {
  readonly path: string;

  constructor(message: string, targetPath: string, options?: { cause?: unknown }) {
    super("target_directory", message, options);
    this.path = targetPath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
