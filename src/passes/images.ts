import path from "node:path";
import { findByName } from "../tree";
import type { Element } from "../tree";
import type { Article, Pass, PassContext } from "../types";
import { getImageLocation } from "../utils/article-paths";
import { reportFailure } from "./helpers";

/**
 * Numbers the images of one article in document order. Images without a
 * source still take a number, so asset names follow the article layout.
 */
export class ImageState {
  private index = 0;

  next(): number {
    return this.index++;
  }
}

function absoluteUrl(src: string): string {
  return src.startsWith("//") ? `https:${src}` : src;
}

function imageFileName(url: URL): string {
  return path.posix.basename(url.pathname) || "image";
}

async function storeImage(
  img: Element,
  src: string,
  index: number,
  article: Article,
  ctx: PassContext,
): Promise<void> {
  try {
    const url = new URL(absoluteUrl(src));
    const location = getImageLocation(article, imageFileName(url), index);
    ctx.logger.debug(`Downloading ${url.href} to ${location}`);

    const data = await ctx.collaborators.fetchResource(url.href);
    const handle = await ctx.collaborators.storeImage(location, data);

    // Layout software places images through <link href>
    img.name = "link";
    delete img.attribs.src;
    img.attribs.href = handle.href;
    ctx.tracker.incrementImagesStored();
  } catch (error) {
    reportFailure(ctx, article, imagesPass.name, src, error);
  }
}

export const imagesPass: Pass = {
  name: "images",

  async run(article, ctx) {
    const state = new ImageState();
    for (const img of findByName(article.content, ["img"])) {
      const index = state.next();
      const src = img.attribs.src;
      if (!src) continue;
      await storeImage(img, src, index, article, ctx);
    }
  },
};
