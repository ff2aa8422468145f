import type { BindingPlan } from "./types.js";
import { parseBooleanLiteral, tryConvert } from "./convert.js";

/**
 * Walk the tokens after the command name and fill `vector` in place.
 * Example: ["web", "--port", "80", "--verbose"] with `image` positional,
 * `--port` integer and `--verbose` boolean -> ["web", 80, true]
 *
 * Unknown `--` tokens are skipped without consuming a value, surplus bare
 * tokens are dropped, and a token is never consumed twice.
 */
export function parseTokens(tokens: readonly string[], plan: BindingPlan, vector: unknown[]): void {
  const queue = [...plan.positional];

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];

    if (token.startsWith("--")) {
      const binding = plan.named.get(token);
      if (binding) {
        // The next token is a value only if it isn't itself alias-shaped
        const next: string | undefined = tokens[i + 1];
        const hasValue = next !== undefined && !next.startsWith("--");

        if (binding.type === "boolean") {
          vector[binding.index] = hasValue ? (parseBooleanLiteral(next) ?? true) : true;
        } else {
          vector[binding.index] = hasValue ? tryConvert(next, binding.type) : undefined;
        }

        if (hasValue) {
          i += 1;
        }
      }
      i += 1;
    } else {
      const binding = queue.shift();
      if (binding) {
        vector[binding.index] = tryConvert(token, binding.type);
      }
      i += 1;
    }
  }
}
