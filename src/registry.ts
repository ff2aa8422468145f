import { buildBindingPlan } from "./cli/binding.js";
import { log } from "./logger.js";
import type { CommandDescriptor, CommandFn, CommandHandler, ParameterSpec, RawCommandFn } from "./types.js";

/**
 * Wrap a handler whose parameters line up with `parameters`. The arity is
 * taken from `handler.length`, so handlers should not use JS default values;
 * declare defaults on the parameter specs instead.
 */
export function describeCommand<const P extends readonly ParameterSpec[]>(
  name: string,
  description: string | undefined,
  parameters: P,
  handler: CommandFn<P>
): CommandDescriptor {
  return freezeDescriptor(name, description, parameters, {
    kind: "positional",
    arity: handler.length,
    invoke: (args) => Reflect.apply(handler, undefined, args),
  });
}

export function describeRawCommand(
  name: string,
  description: string | undefined,
  parameters: readonly ParameterSpec[],
  handler: RawCommandFn
): CommandDescriptor {
  return freezeDescriptor(name, description, parameters, {
    kind: "raw",
    arity: handler.length,
    invoke: (resolver, args) => handler(resolver, args),
  });
}

function freezeDescriptor(
  name: string,
  description: string | undefined,
  parameters: readonly ParameterSpec[],
  handler: CommandHandler
): CommandDescriptor {
  // Rejects shared aliases at registration.
  buildBindingPlan(parameters, name);
  const descriptor: CommandDescriptor = {
    name,
    description,
    parameters: Object.freeze([...parameters]),
    handler: Object.freeze(handler),
  };
  return Object.freeze(descriptor);
}

/**
 * Ordered, append-only list of commands. Names are matched exactly and the
 * first registration of a name wins.
 */
export class CommandRegistry {
  private readonly descriptors: CommandDescriptor[] = [];

  add(descriptor: CommandDescriptor): void {
    if (this.find(descriptor.name)) {
      log(`duplicate command '${descriptor.name}' registered; the first registration wins`);
    }
    this.descriptors.push(descriptor);
  }

  find(name: string): CommandDescriptor | undefined {
    return this.descriptors.find((d) => d.name === name);
  }

  get size(): number {
    return this.descriptors.length;
  }

  /** Commands ordered by name; registration order breaks ties. */
  sorted(): CommandDescriptor[] {
    return [...this.descriptors].sort((a, b) => a.name.localeCompare(b.name));
  }
}
