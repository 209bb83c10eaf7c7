export * from "./errors";
export * from "./quota";
export * from "./state";
export * from "./time";
