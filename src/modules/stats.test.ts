import { describe, expect, it } from "vitest";
import { formatDuration } from "./stats";

describe("formatDuration", () => {
  it("picks a unit by magnitude", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(125000)).toBe("2m 5s");
  });
});
