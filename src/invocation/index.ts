export {
  normalize,
  entrypointArgs,
  type InvocationSpec,
  type LauncherOptions,
  type NormalizeDefaults,
  type ResourceLimits,
} from "./normalizer.js";
export { FLAG_TABLE, lookupFlag, type FlagDefinition } from "./flags.js";
