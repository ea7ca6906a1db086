export * from "./types";
export * from "./errors";
export * from "./log";
export * from "./codec";
export * from "./validation";
export * from "./scopes";
export * from "./identity";
export * from "./crypto";
export * from "./token";
export * from "./dedupe";
export * from "./game";
