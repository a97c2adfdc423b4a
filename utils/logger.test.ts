import { describe, expect, it } from "vitest";
import { format } from "./logger";

describe("format", () => {
  it("stringifies objects and errors after a timestamped level", () => {
    expect(format("INFO", "Saved", { count: 2 }, new TypeError("boom"))).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] Saved \{"count":2\} TypeError: boom$/
    );
  });

  it("omits the separator when there is nothing to log", () => {
    expect(format("WARN")).toMatch(/\[WARN\]$/);
  });
});
