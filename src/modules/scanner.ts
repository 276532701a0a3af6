/**
 * Scanner Module
 * Finds the export files to read
 */

import glob from "fast-glob";
import { stat } from "fs/promises";
import path from "node:path";
import type { ConversionContext } from "../types";

/**
 * The export path is either a single WXR file or a directory of them
 *
 * Writes to context:
 * - exportFiles: absolute paths, sorted
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const exportPath = path.resolve(ctx.exportPath);
  const info = await stat(exportPath);

  if (info.isFile()) {
    ctx.exportFiles = [exportPath];
    return;
  }

  const files = await glob("**/*.xml", {
    cwd: exportPath,
    absolute: true,
    onlyFiles: true,
  });

  ctx.exportFiles = files.sort((a, b) => a.localeCompare(b));
  ctx.logger.debug(`Found ${files.length} export files in ${exportPath}`);
}
