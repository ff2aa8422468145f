import { arg, createCommandHost, inject, opt, type CommandHostOptions } from "../../src/index.js";
import { GreetingService } from "./greeting-service.js";

/** Example program: a few inline commands plus the scanned GreetingService methods. */
export function buildGreetingHost(options: CommandHostOptions = {}) {
  const builder = createCommandHost(options);

  builder.services.singleton(GreetingService);

  builder.addCommand("greet", "Say hello", [arg.string("name")], (name) => {
    console.log(`Hello, ${name}!`);
  });

  builder.addCommand("sum", [arg.integer("a"), arg.integer("b")], (a, b) => {
    console.log(a + b);
  });

  builder.addCommand("hello", [inject("svc", GreetingService)], (svc) => svc?.sayHello());

  builder.addCommand(
    "hello-async",
    [inject("svc", GreetingService), arg.string("name")],
    async (svc, name) => await svc?.sayHelloAsync(name)
  );

  builder.addCommand(
    "deploy",
    "Print the plan for running an image",
    [
      arg.string("image"),
      opt.string("containerName", { description: "Name for the container" }),
      opt.integer("replicas", { alias: "count", default: 1 }),
      opt.boolean("dryRun", { description: "Only print the plan" }),
    ],
    (image, containerName, replicas, dryRun) => {
      const prefix = dryRun ? "[dry run] " : "";
      console.log(`${prefix}${image} as ${containerName} x${replicas}`);
    }
  );

  builder.addCommands(GreetingService, { sayHelloAsync: [arg.string("name")] });

  return builder.build();
}
