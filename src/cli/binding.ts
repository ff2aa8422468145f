import { DuplicateAliasError } from "../errors.js";
import { aliasFor } from "../naming.js";
import type { ParameterSpec } from "../types.js";
import type { BindingPlan } from "./types.js";

/**
 * Split parameters into positional, named and injected slots. Injected
 * parameters never bind from tokens, even when they carry option metadata.
 * Two named parameters sharing an alias throw `DuplicateAliasError`.
 */
export function buildBindingPlan(parameters: readonly ParameterSpec[], command?: string): BindingPlan {
  const plan: BindingPlan = { positional: [], named: new Map(), external: [] };

  parameters.forEach((spec, index) => {
    switch (spec.role) {
      case "injected":
        plan.external.push({ index, key: spec.key });
        break;
      case "named": {
        const alias = aliasFor(spec);
        if (plan.named.has(alias)) {
          throw new DuplicateAliasError(alias, command);
        }
        plan.named.set(alias, { index, alias, type: spec.type });
        break;
      }
      case "positional":
        plan.positional.push({ index, name: spec.name, type: spec.type });
        break;
    }
  });

  return plan;
}
