export {
  COMMAND_PATTERNS,
  DEFAULT_WAIT_TIMEOUT_MS,
  normalizeCommand,
  normalizeUrl,
  resolveAll,
  resolveCommand,
} from "./command-resolver.js";
export type { CommandPattern, ResolvedMatch } from "./command-resolver.js";
export { applyOptions, extractExecutionOptions } from "./options.js";
export type { ExecutionOptions } from "./options.js";
export { describeIntent, isSecretField } from "./describe.js";
