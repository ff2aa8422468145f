import { ServiceNotFoundError, ServiceResolutionError } from "./errors.js";
import type { Constructor, Resolver, ServiceClass, ServiceKey } from "./types.js";

export type Factory<T> = (resolver: Resolver) => T;

type Lifetime = "singleton" | "transient";

interface Registration {
  lifetime: Lifetime;
  factory: Factory<unknown>;
  instance?: unknown;
  created: boolean;
}

/**
 * Class-keyed service container. Resolution checks the produced value with
 * `instanceof`, so factories must return real instances of their key.
 *
 * ```ts
 * const services = new ServiceContainer();
 * services.singleton(GreetingService);
 * services.transient(Clock, () => new SystemClock());
 * services.resolve(GreetingService); // GreetingService | null
 * ```
 */
export class ServiceContainer implements Resolver {
  private readonly registrations = new Map<ServiceKey<unknown>, Registration>();

  constructor() {
    this.instance(ServiceContainer, this);
  }

  singleton<T>(key: ServiceClass<T>): this;
  singleton<T>(key: Constructor<T>, factory: Factory<T>): this;
  singleton<T>(key: ServiceClass<T>, factory?: Factory<T>): this {
    return this.register(key, "singleton", factory ?? ((resolver) => new key(resolver)));
  }

  transient<T>(key: ServiceClass<T>): this;
  transient<T>(key: Constructor<T>, factory: Factory<T>): this;
  transient<T>(key: ServiceClass<T>, factory?: Factory<T>): this {
    return this.register(key, "transient", factory ?? ((resolver) => new key(resolver)));
  }

  instance<T>(key: Constructor<T>, value: T): this {
    this.registrations.set(key, {
      lifetime: "singleton",
      factory: () => value,
      instance: value,
      created: true,
    });
    return this;
  }

  has(key: ServiceKey<unknown>): boolean {
    return this.registrations.has(key);
  }

  /** The registered service, or `null` when the key is unknown. */
  resolve<T>(key: ServiceKey<T>): T | null {
    const registration = this.registrations.get(key);
    if (!registration) {
      return null;
    }

    const value = this.produce(registration);
    if (!(value instanceof key)) {
      throw new ServiceResolutionError(key.name);
    }
    return value;
  }

  require<T>(key: ServiceKey<T>): T {
    const value = this.resolve(key);
    if (value === null) {
      throw new ServiceNotFoundError(key.name);
    }
    return value;
  }

  private register(key: ServiceKey<unknown>, lifetime: Lifetime, factory: Factory<unknown>): this {
    this.registrations.set(key, { lifetime, factory, created: false });
    return this;
  }

  private produce(registration: Registration): unknown {
    if (registration.lifetime === "transient") {
      return registration.factory(this);
    }
    if (!registration.created) {
      registration.instance = registration.factory(this);
      registration.created = true;
    }
    return registration.instance;
  }
}
