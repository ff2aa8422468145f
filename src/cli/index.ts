import { HandlerSignatureError } from "../errors.js";
import { log } from "../logger.js";
import type { CommandDescriptor, Resolver } from "../types.js";
import { buildBindingPlan } from "./binding.js";
import { applyDefaults, describeMissing } from "./defaults.js";
import { renderHelp } from "./help.js";
import { parseTokens } from "./parser.js";
import type { DispatchContext } from "./types.js";

function showHelp(context: DispatchContext): void {
  for (const line of renderHelp(context.registry, context.formatter.style)) {
    context.formatter.info(line);
  }
}

async function invokeHandler(descriptor: CommandDescriptor, vector: unknown[], resolver: Resolver): Promise<void> {
  const { handler } = descriptor;

  let result: unknown;
  if (handler.kind === "positional") {
    if (handler.arity !== vector.length) {
      throw new HandlerSignatureError(descriptor.name, handler.arity, vector.length);
    }
    result = handler.invoke(vector);
  } else {
    if (handler.arity !== 2) {
      throw new HandlerSignatureError(descriptor.name, handler.arity, 2);
    }
    result = handler.invoke(resolver, vector);
  }

  await result;
}

/**
 * Main dispatcher: argv[0] names the command, the rest are its tokens.
 * Resolves to the process exit code. User mistakes (unknown command, missing
 * value) are reported and give 1; a handler with an unsupported arity throws
 * `HandlerSignatureError`, and handler failures propagate.
 */
export async function dispatch(argv: readonly string[], context: DispatchContext): Promise<number> {
  const { registry, resolver, formatter } = context;

  if (registry.size === 0) {
    formatter.error("No commands registered.");
    return 1;
  }

  if (argv.length === 0) {
    showHelp(context);
    return 0;
  }

  const [name, ...tokens] = argv;
  const descriptor = registry.find(name);
  if (!name || !descriptor) {
    log(`unknown command: ${JSON.stringify(name)}`);
    formatter.error(name ? `Unknown command '${name}'.` : "Unknown or missing command.");
    showHelp(context);
    return 1;
  }

  log(`dispatching '${name}' with tokens ${JSON.stringify(tokens)}`);

  // Built fresh for every dispatch; slots start unset
  const plan = buildBindingPlan(descriptor.parameters, descriptor.name);
  const vector: unknown[] = new Array<unknown>(descriptor.parameters.length).fill(undefined);

  parseTokens(tokens, plan, vector);

  const missing = applyDefaults(descriptor.parameters, vector);
  if (missing) {
    log(`missing value: ${JSON.stringify(missing)}`);
    formatter.error(describeMissing(missing));
    return 1;
  }

  for (const binding of plan.external) {
    const service = resolver.resolve(binding.key);
    if (service === null) {
      log(`no service for parameter ${binding.index} (${binding.key.name}); passing null`);
    }
    vector[binding.index] = service;
  }

  await invokeHandler(descriptor, vector, resolver);
  log(`'${name}' completed`);
  return 0;
}
