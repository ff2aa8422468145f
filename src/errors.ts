export class CommandHostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The handler's arity fits neither the declared parameter list nor the
 * `(resolver, args)` shape. A registration mistake, never bad user input.
 */
export class HandlerSignatureError extends CommandHostError {
  constructor(
    readonly command: string,
    readonly arity: number,
    readonly expected: number
  ) {
    super(`Unsupported handler signature for '${command}': takes ${arity} parameter(s), expected ${expected}.`);
  }
}

export class ServiceNotFoundError extends CommandHostError {
  constructor(readonly service: string) {
    super(`No service registered for '${service}'.`);
  }
}

/** A factory returned something that is not an instance of its key. */
export class ServiceResolutionError extends CommandHostError {
  constructor(readonly service: string) {
    super(`Factory for '${service}' did not return an instance of ${service}.`);
  }
}

/** Two named parameters of one command bind to the same `--alias`. */
export class DuplicateAliasError extends CommandHostError {
  constructor(
    readonly alias: string,
    readonly command?: string
  ) {
    super(
      command
        ? `Command '${command}' declares the option '${alias}' more than once.`
        : `The option '${alias}' is declared more than once.`
    );
  }
}
