import type { NamedSpec } from "./types.js";

function isUpper(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

function isLower(char: string): boolean {
  return char !== char.toUpperCase() && char === char.toLowerCase();
}

/**
 * Convert a camelCase or PascalCase identifier to kebab-case.
 * Example: "containerName" -> "container-name", "HTTPServer" -> "http-server"
 */
export function toKebabCase(name: string): string {
  let result = "";

  for (let i = 0; i < name.length; i++) {
    const char = name[i];

    if (!isUpper(char)) {
      result += char;
      continue;
    }

    // A dash starts a new word: after a lowercase letter ("aB"), or at the
    // last capital of an acronym that runs into a word ("HTTPServer")
    const precededByLower = i > 0 && isLower(name[i - 1]);
    const followedByLower = i + 1 < name.length && isLower(name[i + 1]);
    if (i > 0 && (precededByLower || followedByLower)) {
      result += "-";
    }
    result += char.toLowerCase();
  }

  return result;
}

/** The `--`-prefixed name a named option is addressed by. */
export function aliasFor(spec: Pick<NamedSpec, "name" | "option">): string {
  const override = spec.option.alias;
  const name = override !== undefined && override.trim() !== "" ? override : toKebabCase(spec.name);
  return `--${name}`;
}
