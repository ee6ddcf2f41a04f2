import { describe, expect, it } from "vitest";
import { buildCli } from "./main";

describe("buildCli", () => {
  it("registers only commands that work from a fresh process", () => {
    const names = buildCli().commands.map((command) => command.name());

    expect(names).toEqual([
      "analyze",
      "precompute",
      "status",
      "catalog",
      "probe-models",
    ]);
  });

  it("keeps per-run counters behind the analyze --stats flag", () => {
    const analyze = buildCli().commands.find(
      (command) => command.name() === "analyze",
    );

    expect(analyze?.options.map((option) => option.long)).toContain("--stats");
  });
});
