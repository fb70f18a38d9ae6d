// @devsim/core - command binding and cooperative scheduling for simulated devices.
//
// Protocol packages (such as @devsim/stream) build on these primitives.

// Command specs
export {
  type ArgumentMapping,
  type CommandDefinition,
  type CommandOptions,
  type CommandSpec,
  type PatternSource,
  type PropertyCommandSpec,
  type PropertyOptions,
  type ReturnMapping,
  applyReturnMapping,
  cmd,
  mapConstant,
  mapIdentity,
  mapToString,
  mapWith,
  prop,
} from "./commands.ts";

// Targets
export {
  type CommandTarget,
  type Method,
  type PropertyAccessor,
  type TargetDefinition,
  defineTarget,
} from "./target.ts";

// Binding
export {
  type BindOptions,
  type BindTargets,
  type CompiledPattern,
  type MatchMode,
  BindingTable,
  BoundCommand,
  bindCommands,
  compilePattern,
} from "./binding.ts";

// Errors
export {
  BindingError,
  ConfigurationError,
  DispatchError,
  RegistryError,
  rootCause,
  toError,
} from "./errors.ts";

// Endpoints and scheduling
export { type EndpointOptions, type ProtocolEndpoint, parseOptions } from "./endpoint.ts";
export { Readiness, checkBudget } from "./readiness.ts";
export { EndpointScheduler, type SchedulerOptions } from "./scheduler.ts";

// Logging
export { type Logger, componentLogger, formatDuration, logger } from "./logging.ts";
