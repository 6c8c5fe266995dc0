export * from "./types";
export * from "./errors";
export * from "./cards";
export * from "./handEvaluator";
export * from "./rankOracle";
export * from "./hybridRanker";
export * from "./strengthClassifier";
export * from "./config";
