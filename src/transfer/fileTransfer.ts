import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { AppConfig } from "../config";
import { errorMessage, TransferError } from "../core/errors";
import { defaultFetch, FetchFn, getFetchDispatcher } from "../core/fetch";
import { Logger } from "../observability";
import { PARTIAL_DOWNLOAD_SUFFIX } from "../sync/localInventory";
import { toPathSegment } from "../sync/paths";
import { DownloadResult, FileDescriptor, RemoteFileEntry } from "../types";
import { FileTransfer } from "./types";

type TransferConfig = Pick<
  AppConfig,
  "userAgent" | "ignoreHttpsErrors" | "downloadTimeoutMs" | "maxDownloadAttempts"
>;

export interface LocalFileTransferDeps {
  config: TransferConfig;
  logger: Logger;
  /** Session cookie forwarded with every download. */
  cookie?: string;
  fetchFn?: FetchFn;
  sleepFn?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function backoffMs(attempt: number): number {
  return Math.min(1000 * 2 ** (attempt - 1), 10_000);
}

function toEpochSeconds(iso: string): number {
  return Math.floor(new Date(iso).getTime() / 1000);
}

export class LocalFileTransfer implements FileTransfer {
  private readonly config: TransferConfig;
  private readonly logger: Logger;
  private readonly cookie?: string;
  private readonly fetchFn: FetchFn;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(deps: LocalFileTransferDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.cookie = deps.cookie;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.sleepFn = deps.sleepFn ?? sleep;
  }

  // A local copy at least as recent as the remote timestamp is kept.
  async resolveLocal(entry: RemoteFileEntry, targetFolder: string): Promise<FileDescriptor | undefined> {
    const targetPath = path.join(targetFolder, toPathSegment(entry.name));
    try {
      const stats = await fs.promises.stat(targetPath);
      if (stats.isFile() && Math.floor(stats.mtimeMs / 1000) >= toEpochSeconds(entry.modifiedAt)) {
        return undefined;
      }
      this.logger.debug("file_outdated", { path: targetPath, url: entry.url });
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        throw error;
      }
    }

    return {
      targetPath,
      url: entry.url,
      size: entry.size,
      modifiedAt: entry.modifiedAt,
    };
  }

  async download(descriptor: FileDescriptor): Promise<DownloadResult> {
    const maxAttempts = Math.max(1, this.config.maxDownloadAttempts);

    for (let attempt = 1; ; attempt += 1) {
      try {
        const bytes = await this.downloadAttempt(descriptor);
        this.logger.info("download_item_ok", { url: descriptor.url, path: descriptor.targetPath, attempt, bytes });
        return {
          targetPath: descriptor.targetPath,
          url: descriptor.url,
          status: "downloaded_ok",
          bytes,
          attempt,
          downloadedAt: new Date().toISOString(),
        };
      } catch (error) {
        const retriable = !(error instanceof TransferError) || isRetriableTransfer(error);
        if (!retriable || attempt >= maxAttempts) {
          throw error instanceof TransferError
            ? error
            : new TransferError(errorMessage(error), descriptor.url, descriptor.targetPath, { cause: error });
        }

        this.logger.warn("download_item_retry", {
          url: descriptor.url,
          path: descriptor.targetPath,
          attempt,
          error: errorMessage(error),
        });
        await this.sleepFn(backoffMs(attempt));
      }
    }
  }

  private async downloadAttempt(descriptor: FileDescriptor): Promise<number> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.downloadTimeoutMs);
    const tempPath = `${descriptor.targetPath}${PARTIAL_DOWNLOAD_SUFFIX}`;

    try {
      const headers: Record<string, string> = { "user-agent": this.config.userAgent };
      if (this.cookie) {
        headers.cookie = this.cookie;
      }
      const response = await this.fetchFn(descriptor.url, {
        method: "GET",
        headers,
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new HttpStatusError(response.status, descriptor);
      }
      if (!response.body) {
        throw new TransferError(`Empty body for ${descriptor.url}`, descriptor.url, descriptor.targetPath);
      }

      await fs.promises.mkdir(path.dirname(descriptor.targetPath), { recursive: true });
      let bytes = 0;
      const readable = Readable.fromWeb(response.body);
      readable.on("data", (chunk: Buffer | string) => {
        bytes += typeof chunk === "string" ? Buffer.byteLength(chunk) : chunk.length;
      });

      try {
        await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));
        await fs.promises.rename(tempPath, descriptor.targetPath);
      } catch (error) {
        await fs.promises.rm(tempPath, { force: true });
        throw error;
      }

      const modifiedAt = new Date(descriptor.modifiedAt);
      if (!Number.isNaN(modifiedAt.getTime())) {
        await fs.promises.utimes(descriptor.targetPath, modifiedAt, modifiedAt);
      }
      return bytes;
    } finally {
      clearTimeout(timeout);
    }
  }
}

class HttpStatusError extends TransferError {
  readonly status: number;

  constructor(status: number, descriptor: FileDescriptor) {
    super(`HTTP ${status} while downloading ${descriptor.url}`, descriptor.url, descriptor.targetPath);
    this.status = status;
  }
}

function isRetriableTransfer(error: TransferError): boolean {
  return error instanceof HttpStatusError && isRetriableStatus(error.status);
}
