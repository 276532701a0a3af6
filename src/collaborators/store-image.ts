/**
 * Image store
 * Raster images are scaled to the column width at print resolution; vector
 * images are stored untouched
 */

import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import sharp from "sharp";
import type { Collaborators, ImagesConfig } from "../types";
import { CollaboratorError } from "../utils/errors";

type ImageOptions = Pick<ImagesConfig, "width" | "dpi">;

export async function prepareImage(data: Buffer, options: ImageOptions): Promise<Buffer> {
  const image = sharp(data);
  const { format } = await image.metadata();
  if (format === "svg") return data;

  return image
    .resize({ width: options.width })
    .withMetadata({ density: options.dpi })
    .toBuffer();
}

export function createStoreImage(
  options: ImageOptions,
  assetDir: string,
): Collaborators["storeImage"] {
  return async (location, data) => {
    const target = path.resolve(assetDir, location);
    try {
      const output = await prepareImage(data, options);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, output);
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw new CollaboratorError("storeImage", `Could not store ${location}: ${details}`, {
        cause: error,
      });
    }
    return { href: pathToFileURL(target).href };
  };
}
