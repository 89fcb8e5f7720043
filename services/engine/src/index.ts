export * from "./types";
export * from "./pricing";
export * from "./volatilityPatterns";
export * from "./volatilityTracker";
export * from "./signal";
export * from "./positionManager";
export * from "./deltaHedger";
export * from "./riskGovernor";
export * from "./tickEngine";
