import type { TypeTag } from "../types.js";

const INTEGER = /^\s*[+-]?\d+\s*$/;
const DECIMAL = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

/** Strict `true`/`false`, ignoring case and surrounding whitespace. */
export function parseBooleanLiteral(token: string): boolean | undefined {
  const value = token.trim().toLowerCase();
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

/**
 * Convert one token to the requested type, or `undefined` when it does not
 * parse. Callers treat `undefined` as "not given": a malformed value and a
 * missing value look the same to defaulting and to the user.
 */
export function tryConvert(token: string, type: TypeTag): string | boolean | number | undefined {
  switch (type) {
    case "string":
      return token;
    case "boolean":
      return parseBooleanLiteral(token);
    case "integer": {
      if (!INTEGER.test(token)) return undefined;
      // `+ 0` folds "-0" into 0
      const value = Number(token) + 0;
      return Number.isSafeInteger(value) ? value : undefined;
    }
    case "number": {
      if (!DECIMAL.test(token)) return undefined;
      const value = Number(token);
      return Number.isFinite(value) ? value : undefined;
    }
  }
}
