import { aliasFor } from "../naming.js";
import type { ParameterSpec } from "../types.js";
import type { MissingValue } from "./types.js";

/**
 * Fill every unset positional and named slot from its declared default.
 * Unset boolean options fall back to `false`. Returns the first parameter
 * that has neither a value nor a default, or `null` when all are filled.
 */
export function applyDefaults(parameters: readonly ParameterSpec[], vector: unknown[]): MissingValue | null {
  for (let index = 0; index < parameters.length; index++) {
    const spec = parameters[index];
    if (spec.role === "injected" || vector[index] !== undefined) {
      continue;
    }

    if (spec.hasDefault) {
      vector[index] = spec.defaultValue;
    } else if (spec.role === "named" && spec.type === "boolean") {
      vector[index] = false;
    } else if (spec.role === "named") {
      return { kind: "missing-option", alias: aliasFor(spec) };
    } else {
      return { kind: "missing-argument", name: spec.name };
    }
  }

  return null;
}

export function describeMissing(missing: MissingValue): string {
  return missing.kind === "missing-option"
    ? `Missing required option '${missing.alias}'.`
    : `Missing required argument '${missing.name}'.`;
}
