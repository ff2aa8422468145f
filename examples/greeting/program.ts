#!/usr/bin/env node
import { buildGreetingHost } from "./commands.js";

async function main() {
  const host = buildGreetingHost();
  process.exitCode = await host.run(process.argv.slice(2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
