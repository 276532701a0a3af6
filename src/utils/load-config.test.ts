import { describe, expect, it } from "vitest";
import { loadDefaultConfig, mergeConfig } from "./load-config";

describe("mergeConfig", () => {
  it("merges nested sections and keeps unrelated defaults", async () => {
    const base = await loadDefaultConfig();

    const merged = mergeConfig(base, {
      images: { width: 800 },
      code: { aliases: { kt: "kotlin" } },
      export: { approvedCategory: "Ready for print" },
    });

    expect(merged.images.width).toBe(800);
    expect(merged.images.dpi).toBe(300);
    expect(merged.code.aliases.kt).toBe("kotlin");
    expect(merged.code.aliases.js).toBe("javascript");
    expect(merged.export.approvedCategory).toBe("Ready for print");
    expect(merged.export.metaKeys.author).toBe("mn_author");
  });
});
