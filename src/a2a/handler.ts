import type { Payload } from "../core/types";
import type { RequestEnvelope } from "./types";

/**
 * Agent-specific logic bound to a server. Receives each decoded request and
 * returns the reply payload; throwing (or rejecting) turns into an `error`
 * envelope. Must tolerate concurrent invocation.
 */
export type MessageHandler = (
  envelope: RequestEnvelope,
) => Payload | Promise<Payload>;

export type ActionHandler = MessageHandler;

export const UNKNOWN_ACTION_RESULT = Object.freeze({
  status: "error",
  message: "Unknown action",
});

/**
 * Route requests on `payload.action`. Requests naming no registered action
 * get `{ status: "error", message: "Unknown action" }` rather than a thrown
 * error, matching the payload-level status convention.
 */
export function createActionHandler(
  actions: Record<string, ActionHandler>,
): MessageHandler {
  return (envelope) => {
    const action = envelope.payload.action;
    if (typeof action === "string" && Object.hasOwn(actions, action)) {
      return actions[action](envelope);
    }
    return { ...UNKNOWN_ACTION_RESULT };
  };
}
