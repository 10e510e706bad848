/**
 * figstyle - intent-based style resolution and fractional tick labels for typeset figures
 */

export const version = '1.0.0';

// Style resolution
export { resolveStyle, createStyleScope, StyleResolver } from './config/StyleResolver';
export { createRuleRegistry, defaultRegistry } from './config/registry';
export type { RuleRegistry, RuleRegistryInput } from './config/registry';
export {
  COMMON_SUFFIX,
  PREAMBLE_OPTION,
  SIZE_OPTION,
  STYLE_NAMESPACE,
  TYPESET_FRAGMENT,
  WIDE_SIZE_OPTION,
  defaultFragments,
  hostDefaults,
  metaKeys,
  weedKeys,
} from './config/defaults';
export type { MetaKey } from './config/defaults';
export type {
  HostDefaults,
  OptionScalar,
  OptionValue,
  ResolvedStyle,
  StyleFragment,
  StyleRequest,
  StyleRequestInput,
  StyleScope,
} from './config/types';

// Tick labels
export { fractionTicks, formatFractionLabel } from './ticks/fractionTicks';
export type { FractionTickOptions, FractionTicks } from './ticks/fractionTicks';
export { Rational, roundToRational } from './utils/rational';

// Artifact post-processing
export { postProcessArtifact } from './postprocess/postProcessArtifact';
export type { PostProcessOptions, PostProcessReport, PostProcessStep } from './postprocess/postProcessArtifact';
export { runExternalTool, toolsForArtifact } from './postprocess/externalTools';
export type {
  ExternalToolUnavailable,
  PostProcessFlags,
  RunToolOptions,
  SpawnTool,
  SpawnToolOptions,
  ToolInvocation,
  ToolProcess,
  ToolRole,
  ToolRunResult,
  WarningLogger,
} from './postprocess/externalTools';

// Errors
export {
  FigstyleError,
  InvalidOptionValueError,
  InvalidSquareIndexError,
  InvalidTickCountError,
  InvalidTickRangeError,
  RegistryDefinitionError,
  ExternalToolError,
} from './errors';
export type { FigstyleErrorCode } from './errors';
