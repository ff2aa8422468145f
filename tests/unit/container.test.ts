import { describe, it, expect } from "vitest";
import { ServiceContainer } from "../../src/container.js";
import { ServiceNotFoundError, ServiceResolutionError } from "../../src/errors.js";
import type { Resolver } from "../../src/types.js";

abstract class Clock {
  abstract now(): string;
}

class FixedClock extends Clock {
  now(): string {
    return "noon";
  }
}

class Counter {
  static created = 0;
  readonly id: number;

  constructor() {
    Counter.created++;
    this.id = Counter.created;
  }
}

class Greeter {
  constructor(readonly resolver: Resolver) {}
}

describe("ServiceContainer", () => {
  it("returns null for unknown services", () => {
    expect(new ServiceContainer().resolve(FixedClock)).toBeNull();
  });

  it("throws from require for unknown services", () => {
    expect(() => new ServiceContainer().require(FixedClock)).toThrow(ServiceNotFoundError);
    expect(() => new ServiceContainer().require(FixedClock)).toThrow("No service registered for 'FixedClock'.");
  });

  it("builds a singleton once", () => {
    const services = new ServiceContainer().singleton(Counter);
    const first = services.resolve(Counter);
    expect(services.resolve(Counter)).toBe(first);
  });

  it("builds a transient on every resolve", () => {
    const services = new ServiceContainer().transient(Counter);
    const first = services.resolve(Counter);
    const second = services.resolve(Counter);
    expect(first).not.toBe(second);
    expect(second?.id).toBe((first?.id ?? 0) + 1);
  });

  it("registers abstract keys through a factory", () => {
    const services = new ServiceContainer().singleton(Clock, () => new FixedClock());
    expect(services.resolve(Clock)?.now()).toBe("noon");
  });

  it("hands the container to constructors it calls", () => {
    const services = new ServiceContainer().singleton(Greeter);
    expect(services.resolve(Greeter)?.resolver).toBe(services);
  });

  it("resolves itself", () => {
    const services = new ServiceContainer();
    expect(services.resolve(ServiceContainer)).toBe(services);
  });

  it("keeps registered instances", () => {
    const clock = new FixedClock();
    const services = new ServiceContainer().instance(Clock, clock);
    expect(services.resolve(Clock)).toBe(clock);
    expect(services.has(Clock)).toBe(true);
  });

  it("rejects factories that do not return an instance of the key", () => {
    const services = new ServiceContainer().singleton(Clock, () => ({ now: () => "never" }));
    expect(() => services.resolve(Clock)).toThrow(ServiceResolutionError);
  });
});
