import { Cause, FiberId, FiberRefs, HashMap, List, Logger, LogLevel, LogSpan } from "effect";
import { describe, expect, test } from "vitest";

import { makeCliStringLogger } from "~/logging/logger";

const date = new Date("2026-02-09T12:00:00.000Z");

const entry = (overrides: Partial<Parameters<Logger.Logger<unknown, string>["log"]>[0]>) => ({
  fiberId: FiberId.none,
  logLevel: LogLevel.Info,
  message: "",
  cause: Cause.empty,
  context: FiberRefs.empty(),
  spans: List.empty<LogSpan.LogSpan>(),
  annotations: HashMap.empty<string, unknown>(),
  date,
  ...overrides,
});

describe("cli logger formatter", () => {
  test("puts the message in the header and payload keys beneath it", () => {
    const logger = makeCliStringLogger({ noColor: true });

    const lines = Logger.test(logger, [
      "Applied profile",
      { name: "tiling", cleanSlate: true, changed: 3 },
    ]).split("\n");

    expect(lines[0]).toMatch(/^ℹ INFO  \d{2}:\d{2}:\d{2}\.\d{3} Applied profile$/);
    expect(lines.slice(1)).toEqual([
      '├─ name: "tiling"',
      "├─ cleanSlate: true",
      "└─ changed: 3",
    ]);
  });

  test("labels values that are not records", () => {
    const logger = makeCliStringLogger({ noColor: true });

    const lines = Logger.test(logger, ["Skipped", ["wm.close", "wm.minimize"]]).split("\n");

    expect(lines.slice(1)).toEqual(['└─ value: ["wm.close","wm.minimize"]']);
  });

  test("renders failures as a node", () => {
    const logger = makeCliStringLogger({ noColor: true });

    const lines = logger
      .log(
        entry({
          logLevel: LogLevel.Error,
          message: "Failed to save shortcut",
          cause: Cause.fail(new Error("read-only")),
        }),
      )
      .split("\n");

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^✖ ERROR .* Failed to save shortcut$/);
    expect(lines[1]).toMatch(/^└─ ✖ \w*Error: read-only$/);
  });

  test("follows nested causes", () => {
    const logger = makeCliStringLogger({ noColor: true });
    const failure = new Error("Could not write profile", { cause: new Error("disk full") });

    const lines = logger
      .log(entry({ logLevel: LogLevel.Error, message: "Save failed", cause: Cause.fail(failure) }))
      .split("\n");

    expect(lines[1]).toMatch(/^└─ ✖ \w*Error: Could not write profile$/);
    expect(lines[2]).toMatch(/^ {5}╰→ caused by \w*Error: disk full$/);
  });

  test("shows annotations and the innermost span", () => {
    const logger = makeCliStringLogger({ noColor: true });

    const lines = logger
      .log(
        entry({
          message: "Reset orphaned shortcuts",
          annotations: HashMap.make(["profile", "tiling"]),
          spans: List.make(LogSpan.make("ProfileService.apply", date.getTime() - 12)),
        }),
      )
      .split("\n");

    expect(lines[0]).toMatch(/ \[ProfileService\.apply: 12ms\] Reset orphaned shortcuts$/);
    expect(lines.slice(1)).toEqual(['└─ profile: "tiling"']);
  });
});
