import { describe, it, expect } from "vitest";
import { DuplicateAliasError, HandlerSignatureError } from "../../src/errors.js";
import { createCommandHost } from "../../src/host.js";
import { arg, inject, opt } from "../../src/params.js";
import { captureOutput, isolatedHostOptions } from "../helpers.js";

class Clock {
  now(): string {
    return "noon";
  }
}

class Missing {}

function setup() {
  const output = captureOutput();
  const builder = createCommandHost(isolatedHostOptions(output.formatter));
  return { output, builder };
}

describe("dispatch", () => {
  it("binds positional tokens in declared order", async () => {
    const { builder } = setup();
    const sums: number[] = [];
    builder.addCommand("sum", [arg.integer("a"), arg.integer("b")], (a, b) => {
      sums.push(a + b);
    });

    expect(await builder.build().run(["sum", "2", "5"])).toBe(0);
    expect(sums).toEqual([7]);
  });

  it("binds boolean flags with and without explicit values", async () => {
    const { builder } = setup();
    const seen: Array<{ watch: boolean; mode: string }> = [];
    builder.addCommand("build", [opt.boolean("watch"), opt.string("mode", { default: "dev" })], (watch, mode) => {
      seen.push({ watch, mode });
    });
    const host = builder.build();

    await host.run(["build", "--watch"]);
    await host.run(["build", "--watch", "--mode", "prod"]);
    await host.run(["build", "--watch", "false"]);
    await host.run(["build"]);

    expect(seen).toEqual([
      { watch: true, mode: "dev" },
      { watch: true, mode: "prod" },
      { watch: false, mode: "dev" },
      { watch: false, mode: "dev" },
    ]);
  });

  it("aborts without invoking the handler when a required option is missing", async () => {
    const { builder, output } = setup();
    let calls = 0;
    builder.addCommand("deploy", [opt.string("target")], () => {
      calls++;
    });

    expect(await builder.build().run(["deploy"])).toBe(1);
    expect(calls).toBe(0);
    expect(output.stderr()).toBe("Missing required option '--target'.\n");
    expect(output.stdout()).toBe("");
  });

  it("aborts when a required argument is missing or malformed", async () => {
    const { builder, output } = setup();
    let calls = 0;
    builder.addCommand("scale", [arg.integer("replicas")], () => {
      calls++;
    });

    expect(await builder.build().run(["scale", "lots"])).toBe(1);
    expect(calls).toBe(0);
    expect(output.stderr()).toBe("Missing required argument 'replicas'.\n");
  });

  it("ignores unknown options", async () => {
    const { builder } = setup();
    const files: string[] = [];
    builder.addCommand("cat", [arg.string("file")], (file) => {
      files.push(file);
    });

    expect(await builder.build().run(["cat", "--bogus", "a.txt"])).toBe(0);
    expect(files).toEqual(["a.txt"]);
  });

  it("prints the listing when no command is given", async () => {
    const { builder, output } = setup();
    builder.addCommand("sum", [arg.integer("a"), arg.integer("b")], () => {});
    builder.addCommand("greet", "Say hello", [arg.string("name")], () => {});

    expect(await builder.build().run([])).toBe(0);
    expect(output.stdout()).toBe("Available commands:\n  greet name    Say hello\n  sum a b\n");
    expect(output.stderr()).toBe("");
  });

  it("reports an unknown command before the listing", async () => {
    const { builder, output } = setup();
    builder.addCommand("greet", "Say hello", [arg.string("name")], () => {});

    expect(await builder.build().run(["nope"])).toBe(1);
    expect(output.stderr()).toBe("Unknown command 'nope'.\n");
    expect(output.stdout()).toBe("Available commands:\n  greet name    Say hello\n");
  });

  it("matches command names case-sensitively", async () => {
    const { builder, output } = setup();
    builder.addCommand("greet", [arg.string("name")], () => {});

    expect(await builder.build().run(["Greet", "x"])).toBe(1);
    expect(output.stderr()).toBe("Unknown command 'Greet'.\n");
    expect(await builder.build().run([""])).toBe(1);
    expect(output.stderr()).toBe("Unknown command 'Greet'.\nUnknown or missing command.\n");
  });

  it("fails when nothing is registered", async () => {
    const { builder, output } = setup();

    expect(await builder.build().run(["anything"])).toBe(1);
    expect(output.stderr()).toBe("No commands registered.\n");
  });

  it("resolves injected parameters wherever they are declared", async () => {
    const { builder } = setup();
    builder.services.instance(Clock, new Clock());
    const seen: string[] = [];
    builder.addCommand("at", [inject("clock", Clock), arg.string("label")], (clock, label) => {
      seen.push(`${label}@${clock?.now()}`);
    });
    builder.addCommand("at-end", [arg.string("label"), inject("clock", Clock)], (label, clock) => {
      seen.push(`${label}@${clock?.now()}`);
    });
    const host = builder.build();

    await host.run(["at", "lunch"]);
    await host.run(["at-end", "tea"]);
    expect(seen).toEqual(["lunch@noon", "tea@noon"]);
  });

  it("passes null for a service that cannot be resolved", async () => {
    const { builder } = setup();
    const seen: unknown[] = [];
    builder.addCommand("miss", [inject("missing", Missing)], (missing) => {
      seen.push(missing);
    });

    expect(await builder.build().run(["miss"])).toBe(0);
    expect(seen).toEqual([null]);
  });

  it("hands raw handlers the resolver and the whole vector", async () => {
    const { builder } = setup();
    const clock = new Clock();
    builder.services.instance(Clock, clock);
    const seen: unknown[] = [];
    builder.addRawCommand("raw", undefined, [arg.string("x"), inject("clock", Clock)], (resolver, args) => {
      seen.push(resolver === builder.services, args);
    });

    expect(await builder.build().run(["raw", "v"])).toBe(0);
    expect(seen).toEqual([true, ["v", clock]]);
  });

  it("throws for a handler whose arity does not match", async () => {
    const { builder } = setup();
    let calls = 0;
    builder.addCommand("bad", [arg.string("a"), arg.string("b")], (a) => {
      calls += a.length;
    });

    await expect(builder.build().run(["bad", "x", "y"])).rejects.toBeInstanceOf(HandlerSignatureError);
    expect(calls).toBe(0);
  });

  it("throws for a raw handler without two parameters", async () => {
    const { builder } = setup();
    builder.addRawCommand("raw", undefined, [], (resolver) => {
      resolver.resolve(Clock);
    });

    await expect(builder.build().run(["raw"])).rejects.toThrow(
      "Unsupported handler signature for 'raw': takes 1 parameter(s), expected 2."
    );
  });

  it("waits for asynchronous handlers", async () => {
    const { builder } = setup();
    let done = false;
    builder.addCommand("slow", [], async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      done = true;
    });

    expect(await builder.build().run(["slow"])).toBe(0);
    expect(done).toBe(true);
  });

  it("propagates handler failures", async () => {
    const { builder } = setup();
    builder.addCommand("boom", [], () => {
      throw new Error("boom");
    });

    await expect(builder.build().run(["boom"])).rejects.toThrow("boom");
  });

  it("refuses to register a command whose options share an alias", async () => {
    const { output, builder } = setup();
    let calls = 0;

    expect(() =>
      builder.addCommand("x", [opt.string("name"), opt.string("other", { alias: "name" })], () => {
        calls++;
      })
    ).toThrow(DuplicateAliasError);
    expect(await builder.build().run(["x", "--name", "v"])).toBe(1);
    expect(output.stderr()).toBe("No commands registered.\n");
    expect(calls).toBe(0);
  });

  it("runs the first of two commands with the same name", async () => {
    const { builder } = setup();
    const seen: string[] = [];
    builder.addCommand("dup", [], () => {
      seen.push("first");
    });
    builder.addCommand("dup", [], () => {
      seen.push("second");
    });

    await builder.build().run(["dup"]);
    expect(seen).toEqual(["first"]);
  });
});
