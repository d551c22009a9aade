export * from "./types";
export * from "./fileTransfer";
