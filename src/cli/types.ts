import type { ChalkInstance } from "chalk";
import type { CommandRegistry } from "../registry.js";
import type { Resolver, ServiceKey, TypeTag } from "../types.js";

export interface PositionalBinding {
  index: number;
  name: string;
  type: TypeTag;
}

export interface NamedBinding {
  index: number;
  alias: string;
  type: TypeTag;
}

export interface ExternalBinding {
  index: number;
  key: ServiceKey<unknown>;
}

/** Per-dispatch partition of a command's parameters. */
export interface BindingPlan {
  positional: PositionalBinding[];
  named: Map<string, NamedBinding>;
  external: ExternalBinding[];
}

export type MissingValue =
  | { kind: "missing-option"; alias: string }
  | { kind: "missing-argument"; name: string };

/** Anything that accepts text, such as `process.stdout`. */
export interface TextSink {
  write(text: string): unknown;
}

export interface OutputFormatter {
  /** Styling for callers that compose their own lines (help). */
  readonly style: ChalkInstance;
  info(line: string): void;
  error(message: string): void;
}

export interface DispatchContext {
  registry: CommandRegistry;
  resolver: Resolver;
  formatter: OutputFormatter;
}
