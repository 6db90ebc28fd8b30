/**
 * AgentWire A2A - Barrel export for envelope types, the message server and
 * the message client.
 * ------------------------------------------------------------------------
 */

export * from "./types";
export * from "./validation";
export * from "./envelope";
export * from "./agentInfo";
export * from "./handler";
export * from "./server";
export * from "./client";
