import { ServiceContainer } from "./container.js";
import { dispatch } from "./cli/index.js";
import { createFormatter } from "./cli/formatters.js";
import type { OutputFormatter } from "./cli/types.js";
import { initLog, log } from "./logger.js";
import { CommandRegistry, describeCommand, describeRawCommand } from "./registry.js";
import { scanCommands, type MethodSignatures } from "./scanner.js";
import { loadSettings, type HostSettings } from "./settings.js";
import type { CommandFn, ParameterSpec, RawCommandFn, ServiceClass } from "./types.js";

export interface CommandHostOptions {
  /** Folder holding `settings.json`. Defaults to `~/.command-host`. */
  configDir?: string;
  /** Wins over the settings file and the environment. */
  settings?: Partial<HostSettings>;
  formatter?: OutputFormatter;
}

export class CommandHost {
  constructor(
    readonly registry: CommandRegistry,
    readonly services: ServiceContainer,
    private readonly formatter: OutputFormatter
  ) {}

  /** Dispatch one invocation and resolve to its exit code. */
  async run(argv: readonly string[]): Promise<number> {
    log(`run: ${JSON.stringify(argv)}`);
    const code = await dispatch(argv, {
      registry: this.registry,
      resolver: this.services,
      formatter: this.formatter,
    });
    log(`exit code ${code}`);
    return code;
  }
}

/**
 * Collects services and commands, then builds a `CommandHost`.
 *
 * ```ts
 * const builder = createCommandHost();
 * builder.addCommand("sum", [arg.integer("a"), arg.integer("b")], (a, b) => {
 *   console.log(a + b);
 * });
 * process.exitCode = await builder.build().run(process.argv.slice(2));
 * ```
 */
export class CommandHostBuilder {
  readonly services = new ServiceContainer();
  private readonly registry = new CommandRegistry();

  constructor(
    readonly settings: HostSettings,
    private readonly formatter: OutputFormatter
  ) {
    this.services.instance(CommandRegistry, this.registry);
  }

  addCommand<const P extends readonly ParameterSpec[]>(name: string, parameters: P, handler: CommandFn<P>): this;
  addCommand<const P extends readonly ParameterSpec[]>(
    name: string,
    description: string | undefined,
    parameters: P,
    handler: CommandFn<P>
  ): this;
  addCommand(
    name: string,
    descriptionOrParameters: string | undefined | readonly ParameterSpec[],
    parametersOrHandler: readonly ParameterSpec[] | CommandFn<readonly ParameterSpec[]>,
    handler?: CommandFn<readonly ParameterSpec[]>
  ): this {
    if (typeof parametersOrHandler === "function") {
      if (typeof descriptionOrParameters !== "object") {
        throw new TypeError(`addCommand('${name}'): expected a parameter list before the handler`);
      }
      this.registry.add(describeCommand(name, undefined, descriptionOrParameters, parametersOrHandler));
    } else {
      if (typeof descriptionOrParameters === "object" || handler === undefined) {
        throw new TypeError(`addCommand('${name}'): expected a description, a parameter list and a handler`);
      }
      this.registry.add(describeCommand(name, descriptionOrParameters, parametersOrHandler, handler));
    }
    return this;
  }

  /** Register a handler that takes the resolver and the raw argument vector. */
  addRawCommand(
    name: string,
    description: string | undefined,
    parameters: readonly ParameterSpec[],
    handler: RawCommandFn
  ): this {
    this.registry.add(describeRawCommand(name, description, parameters, handler));
    return this;
  }

  /**
   * Register every eligible method of `type` as a command. The class is
   * added to the container as transient when instance methods need it and
   * nothing is registered for it yet.
   */
  addCommands<T>(type: ServiceClass<T>, signatures: MethodSignatures = {}): this {
    const { descriptors, needsInstance } = scanCommands(type, signatures);
    for (const descriptor of descriptors) {
      this.registry.add(descriptor);
    }
    if (needsInstance && !this.services.has(type)) {
      this.services.transient(type);
    }
    log(`scanned ${type.name}: ${descriptors.map((d) => d.name).join(", ") || "no commands"}`);
    return this;
  }

  build(): CommandHost {
    return new CommandHost(this.registry, this.services, this.formatter);
  }
}

export function createCommandHost(options: CommandHostOptions = {}): CommandHostBuilder {
  const settings: HostSettings = { ...loadSettings(options.configDir), ...options.settings };
  initLog(settings.debug, settings.logFile);
  log(`settings: ${JSON.stringify(settings)}`);

  return new CommandHostBuilder(settings, options.formatter ?? createFormatter(settings.color));
}
