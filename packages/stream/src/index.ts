// @devsim/stream - line-oriented TCP stream endpoint (Node.js only)
//
// Provides terminator framing, per-connection request dispatch, the TCP
// listener and the endpoint the scheduler drives.

export { TerminatorFramer, frameReply } from "./framing.ts";
export { RequestDispatcher, type DispatcherConfig, type ErrorHook } from "./dispatcher.ts";
export { StreamConnection } from "./connection.ts";
export { ConnectionListener, type DispatcherFactory } from "./listener.ts";
export {
  StreamEndpoint,
  type StreamEndpointConfig,
  type StreamInterface,
} from "./endpoint.ts";
export { StreamOptionsSchema, type StreamOptions, type StreamOptionsInput } from "./options.ts";

// Re-export the command vocabulary for convenience
export {
  cmd,
  prop,
  defineTarget,
  mapConstant,
  mapIdentity,
  mapToString,
  mapWith,
  type CommandDefinition,
  type CommandTarget,
} from "@devsim/core";
