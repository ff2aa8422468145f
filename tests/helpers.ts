import { tmpdir } from "node:os";
import { join } from "node:path";
import { HumanFormatter } from "../src/cli/formatters.js";

/** A formatter that records stdout and stderr instead of writing to the terminal. */
export function captureOutput() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const formatter = new HumanFormatter({
    color: false,
    stdout: { write: (text: string) => stdout.push(text) },
    stderr: { write: (text: string) => stderr.push(text) },
  });

  return {
    formatter,
    stdout: () => stdout.join(""),
    stderr: () => stderr.join(""),
  };
}

/** Host options that never read a real settings file or write a log. */
export function isolatedHostOptions(formatter: HumanFormatter) {
  return {
    configDir: join(tmpdir(), "command-host-tests-no-config"),
    settings: { debug: false, color: false },
    formatter,
  };
}
