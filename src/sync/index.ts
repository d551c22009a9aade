export * from "./cacheStore";
export * from "./catalogIndex";
export * from "./diff";
export * from "./executor";
export * from "./localInventory";
export * from "./orchestrator";
export * from "./paths";
