/** Primitive types a command-line token can be converted into. */
export type TypeTag = "string" | "boolean" | "number" | "integer";

/**
 * Any class, abstract or concrete. Classes are the keys services are
 * registered and resolved under.
 */
export type Constructor<T> = abstract new (...args: never[]) => T;

/** A class the container can build itself by handing it the resolver. */
export type ServiceClass<T> = new (resolver: Resolver) => T;

export type ServiceKey<T> = Constructor<T>;

/** The injection capability consumed by the dispatcher. */
export interface Resolver {
  resolve<T>(key: ServiceKey<T>): T | null;
}

export interface OptionMetadata {
  /** Replaces the kebab-cased parameter name in the `--alias`. */
  readonly alias?: string;
  readonly description?: string;
}

// `__value` is never set at runtime; it carries the bound value type so
// handler parameters can be inferred from the declared specs.
export interface PositionalSpec<V = unknown> {
  readonly role: "positional";
  readonly name: string;
  readonly type: TypeTag;
  readonly hasDefault: boolean;
  readonly defaultValue?: V;
  readonly __value?: V;
}

export interface NamedSpec<V = unknown> {
  readonly role: "named";
  readonly name: string;
  readonly type: TypeTag;
  readonly hasDefault: boolean;
  readonly defaultValue?: V;
  readonly option: OptionMetadata;
  readonly __value?: V;
}

export interface InjectedSpec<V = unknown> {
  readonly role: "injected";
  readonly name: string;
  readonly key: ServiceKey<V>;
  /** Accepted for symmetry with named options; has no effect on binding. */
  readonly option?: OptionMetadata;
}

export type ParameterSpec<V = unknown> = PositionalSpec<V> | NamedSpec<V> | InjectedSpec<V>;

export type BindableSpec = PositionalSpec | NamedSpec;

/** Value a handler receives for one declared parameter. */
export type ArgValue<S> =
  S extends InjectedSpec<infer V>
    ? V | null
    : S extends PositionalSpec<infer V> | NamedSpec<infer V>
      ? V
      : never;

export type ArgsOf<P extends readonly ParameterSpec[]> = {
  -readonly [K in keyof P]: ArgValue<P[K]>;
};

/** A handler's result is awaited before the dispatch completes. */
export type CommandFn<P extends readonly ParameterSpec[]> = (
  ...args: ArgsOf<P>
) => unknown;

/** Escape hatch: receives the resolver and the whole argument vector. */
export type RawCommandFn = (resolver: Resolver, args: unknown[]) => unknown;

export type CommandHandler =
  | {
      readonly kind: "positional";
      readonly arity: number;
      invoke(args: readonly unknown[]): unknown;
    }
  | {
      readonly kind: "raw";
      readonly arity: number;
      invoke(resolver: Resolver, args: unknown[]): unknown;
    };

export interface CommandDescriptor {
  readonly name: string;
  readonly description?: string;
  readonly parameters: readonly ParameterSpec[];
  readonly handler: CommandHandler;
}
