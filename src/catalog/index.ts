export * from "./types";
export * from "./client";
export * from "./htmlParser";
export * from "./login";
