import type {
  InjectedSpec,
  NamedSpec,
  OptionMetadata,
  PositionalSpec,
  ServiceKey,
  TypeTag,
} from "./types.js";

export interface ArgumentOptions<V> {
  default?: V;
}

export interface OptionOptions<V> extends OptionMetadata {
  default?: V;
}

function positional<V>(type: TypeTag) {
  return (name: string, options: ArgumentOptions<V> = {}): PositionalSpec<V> => {
    const spec: PositionalSpec<V> = {
      role: "positional",
      name,
      type,
      hasDefault: options.default !== undefined,
      defaultValue: options.default,
    };
    return Object.freeze(spec);
  };
}

function named<V>(type: TypeTag) {
  return (name: string, options: OptionOptions<V> = {}): NamedSpec<V> => {
    const spec: NamedSpec<V> = {
      role: "named",
      name,
      type,
      hasDefault: options.default !== undefined,
      defaultValue: options.default,
      option: Object.freeze({ alias: options.alias, description: options.description }),
    };
    return Object.freeze(spec);
  };
}

/**
 * Positional arguments, bound from bare tokens in declaration order.
 *
 * ```ts
 * [arg.string("name"), arg.integer("count", { default: 1 })]
 * ```
 */
export const arg = {
  string: positional<string>("string"),
  boolean: positional<boolean>("boolean"),
  number: positional<number>("number"),
  integer: positional<number>("integer"),
};

/**
 * Named options, bound from `--alias value` pairs. Booleans also accept the
 * bare `--alias` form and default to `false`.
 */
export const opt = {
  string: named<string>("string"),
  boolean: named<boolean>("boolean"),
  number: named<number>("number"),
  integer: named<number>("integer"),
};

/** A parameter resolved from the service container, never from tokens. */
export function inject<T>(name: string, key: ServiceKey<T>, option?: OptionMetadata): InjectedSpec<T> {
  const spec: InjectedSpec<T> = { role: "injected", name, key, option };
  return Object.freeze(spec);
}
