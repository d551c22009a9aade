import { DownloadResult, FileDescriptor, RemoteFileEntry } from "../types";

export interface FileTransfer {
  /** Returns undefined when the local copy is already current. */
  resolveLocal(entry: RemoteFileEntry, targetFolder: string): Promise<FileDescriptor | undefined>;
  download(descriptor: FileDescriptor): Promise<DownloadResult>;
}
