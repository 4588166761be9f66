export * from "./stateModel";
export * from "./reconcileRules";
export * from "./events";
