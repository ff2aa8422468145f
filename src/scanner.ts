import { HandlerSignatureError, ServiceNotFoundError } from "./errors.js";
import { log } from "./logger.js";
import { describeRawCommand } from "./registry.js";
import type { CommandDescriptor, Constructor, ParameterSpec } from "./types.js";

/** Parameter lists for scanned methods, keyed by method name. */
export type MethodSignatures = Partial<Record<string, readonly ParameterSpec[]>>;

interface ScannedMethod {
  name: string;
  method: Function;
  isStatic: boolean;
}

export interface ScanResult {
  descriptors: CommandDescriptor[];
  /** True when some command needs an instance of the scanned class. */
  needsInstance: boolean;
}

/** Own and inherited methods of `owner`, stopping at `stop`. */
function collectMethods(owner: object, stop: object, isStatic: boolean): ScannedMethod[] {
  const methods: ScannedMethod[] = [];
  const seen = new Set<string>();

  for (let current: object | null = owner; current && current !== stop; current = Object.getPrototypeOf(current)) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (seen.has(name) || name === "constructor" || name.startsWith("_")) continue;
      seen.add(name);

      // Accessors have no `value`, so getters and setters drop out here
      const value: unknown = Object.getOwnPropertyDescriptor(current, name)?.value;
      if (typeof value === "function") {
        methods.push({ name, method: value, isStatic });
      }
    }
  }

  return methods;
}

function signatureFor(signatures: MethodSignatures, name: string): readonly ParameterSpec[] | undefined {
  return Object.hasOwn(signatures, name) ? signatures[name] : undefined;
}

/**
 * Turn the public methods of a class into commands named by the lowercased
 * method name. Methods that take arguments need an entry in `signatures`;
 * without one they are skipped. Instance methods resolve the class through
 * the resolver when invoked.
 */
export function scanCommands(type: Constructor<unknown>, signatures: MethodSignatures = {}): ScanResult {
  const prototype: unknown = type.prototype;
  const methods = [
    ...collectMethods(type, Function.prototype, true),
    ...(typeof prototype === "object" && prototype !== null
      ? collectMethods(prototype, Object.prototype, false)
      : []),
  ];

  const descriptors: CommandDescriptor[] = [];
  let needsInstance = false;

  for (const { name, method, isStatic } of methods) {
    const parameters = signatureFor(signatures, name) ?? [];
    if (method.length > 0 && parameters.length === 0) {
      log(`skipping ${type.name}.${name}: takes ${method.length} argument(s) but has no signature`);
      continue;
    }

    const commandName = name.toLowerCase();
    descriptors.push(
      describeRawCommand(commandName, name, parameters, (resolver, args) => {
        const target = isStatic ? type : resolver.resolve(type);
        if (target === null) {
          throw new ServiceNotFoundError(type.name);
        }
        if (method.length !== args.length) {
          throw new HandlerSignatureError(commandName, method.length, args.length);
        }
        return Reflect.apply(method, target, args);
      })
    );
    if (!isStatic) {
      needsInstance = true;
    }
  }

  return { descriptors, needsInstance };
}
