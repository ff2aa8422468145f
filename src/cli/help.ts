import type { ChalkInstance } from "chalk";
import type { CommandRegistry } from "../registry.js";
import { aliasFor } from "../naming.js";
import type { CommandDescriptor, ParameterSpec } from "../types.js";

function renderParameter(spec: ParameterSpec): string | null {
  switch (spec.role) {
    case "injected":
      return null;
    case "positional":
      return spec.name;
    case "named": {
      const description = spec.option.description?.trim() ? ` : ${spec.option.description}` : "";
      return `[${aliasFor(spec)}${description}]`;
    }
  }
}

function renderCommand(descriptor: CommandDescriptor, style: ChalkInstance): string {
  const parts = descriptor.parameters
    .map(renderParameter)
    .filter((part): part is string => part !== null);

  const usage = [style.cyan(descriptor.name), ...parts].join(" ");
  return descriptor.description ? `  ${usage}    ${descriptor.description}` : `  ${usage}`;
}

/**
 * Usage listing, one line per command sorted by name:
 *
 * ```
 * Available commands:
 *   deploy image [--replicas : How many copies]    Deploy an image
 *   greet name    Say hello
 * ```
 */
export function renderHelp(registry: CommandRegistry, style: ChalkInstance): string[] {
  return [style.bold("Available commands:"), ...registry.sorted().map((d) => renderCommand(d, style))];
}
