import { existsSync, mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { initLog, log } from "../../src/logger.js";

describe("debug log", () => {
  afterEach(() => {
    initLog(false);
  });

  it("starts a fresh file and appends timed lines", () => {
    const file = join(mkdtempSync(join(tmpdir(), "command-host-log-")), "nested", "debug.log");
    initLog(true, file);
    log("dispatching 'greet'");

    const lines = readFileSync(file, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^=== Debug log started at \d{4}-\d{2}-\d{2}T[\d:.]+Z ===$/);
    expect(lines[1]).toMatch(/^\[\+ *\d+ms\] dispatching 'greet'$/);
  });

  it("writes nothing when disabled", () => {
    const file = join(mkdtempSync(join(tmpdir(), "command-host-log-")), "debug.log");
    initLog(false, file);
    log("ignored");

    expect(existsSync(file)).toBe(false);
  });
});
