/**
 * AgentWire Core - Barrel export for shared types, errors and helpers.
 */

export * from "./errors";
export * from "./types";
export * from "./utils";
