export * from "./evidence";
export * from "./reconciler";
