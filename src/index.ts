export { arg, opt, inject } from "./params.js";
export type { ArgumentOptions, OptionOptions } from "./params.js";
export { createCommandHost, CommandHost, CommandHostBuilder } from "./host.js";
export type { CommandHostOptions } from "./host.js";
export { ServiceContainer } from "./container.js";
export type { Factory } from "./container.js";
export { CommandRegistry, describeCommand, describeRawCommand } from "./registry.js";
export { scanCommands } from "./scanner.js";
export type { MethodSignatures, ScanResult } from "./scanner.js";
export { dispatch } from "./cli/index.js";
export { buildBindingPlan } from "./cli/binding.js";
export type {
  BindingPlan,
  DispatchContext,
  ExternalBinding,
  MissingValue,
  NamedBinding,
  OutputFormatter,
  PositionalBinding,
  TextSink,
} from "./cli/types.js";
export { parseTokens } from "./cli/parser.js";
export { tryConvert, parseBooleanLiteral } from "./cli/convert.js";
export { applyDefaults, describeMissing } from "./cli/defaults.js";
export { renderHelp } from "./cli/help.js";
export { HumanFormatter, createFormatter } from "./cli/formatters.js";
export type { FormatterOptions } from "./cli/formatters.js";
export { toKebabCase, aliasFor } from "./naming.js";
export {
  CommandHostError,
  DuplicateAliasError,
  HandlerSignatureError,
  ServiceNotFoundError,
  ServiceResolutionError,
} from "./errors.js";
export { loadSettings, DEFAULT_SETTINGS, CONFIG_DIR } from "./settings.js";
export type { HostSettings } from "./settings.js";
export { initLog, log } from "./logger.js";
export type * from "./types.js";
