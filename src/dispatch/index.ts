export * from "./concurrency";
export * from "./dispatcher";
export * from "./queries";
export * from "./seed";
