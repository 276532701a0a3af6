import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { fakeCollaborators } from "../test-utils";
import type { ConversionContext } from "../types";
import { loadDefaultConfig } from "../utils/load-config";
import { Logger } from "../utils/logger";
import { Tracker } from "../utils/tracker";
import { scan } from "./scanner";

describe("scan", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "scan-"));
    await mkdir(path.join(dir, "older"));
    await writeFile(path.join(dir, "b.xml"), "<rss/>");
    await writeFile(path.join(dir, "older", "a.xml"), "<rss/>");
    await writeFile(path.join(dir, "notes.txt"), "skip");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function context(exportPath: string): Promise<ConversionContext> {
    return {
      config: await loadDefaultConfig(),
      issue: "v1i1",
      exportPath,
      logger: new Logger("error"),
      tracker: new Tracker(),
      collaborators: fakeCollaborators(),
    };
  }

  it("finds export files below a directory, sorted", async () => {
    const ctx = await context(dir);
    await scan(ctx);
    expect(ctx.exportFiles).toEqual([path.join(dir, "b.xml"), path.join(dir, "older", "a.xml")]);
  });

  it("takes a single file as is", async () => {
    const file = path.join(dir, "b.xml");
    const ctx = await context(file);
    await scan(ctx);
    expect(ctx.exportFiles).toEqual([file]);
  });
});
