export * from "./types";
export * from "./config";
export * from "./errors";
export * from "./rng";
export * from "./hand";
export * from "./shoe";
export * from "./game";
export * from "./martingale";
export * from "./stats";
export * from "./simulate";
