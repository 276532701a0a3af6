/**
 * Imgur embeds
 * `[embed]https://imgur.com/…[/embed]` becomes an <img>. Links without a file
 * extension point at an album or gallery page, which is scraped for the
 * address of its first image.
 */

import { load } from "cheerio";
import { createElement, spliceAllAsync } from "../tree";
import type { Article, PassContext, Pass } from "../types";
import { CollaboratorError } from "../utils/errors";
import { editableText, reportFailure } from "./helpers";

// The hash has an odd length; anything after it (a size suffix) is ignored
const IMGUR_URL = String.raw`(?:https?:)?\/\/(?:i\.)?imgur\.com\/(?<scheme>a\/|gallery\/)?(?<hash>\w{5}(?:\w\w)*).??(?<ext>\.\w+)?`;

export const IMGUR_URL_PATTERN = new RegExp(IMGUR_URL);
export const IMGUR_EMBED_PATTERN = new RegExp(
  String.raw`\[embed\]${IMGUR_URL}\[\/embed\]`,
);

interface ImgurReference {
  scheme: string;
  hash: string;
  ext: string | undefined;
}

function toReference(match: RegExpExecArray): ImgurReference | null {
  const groups = match.groups;
  if (!groups) return null;
  const ext: string | undefined = groups.ext;
  const scheme: string | undefined = groups.scheme;
  return { scheme: scheme ?? "", hash: groups.hash, ext };
}

function directUrl(hash: string, ext: string): string {
  return `https://i.imgur.com/${hash}${ext}`;
}

/**
 * Find the first image of an album or gallery by scraping its embed page
 */
export async function scrapeImgurImage(
  reference: ImgurReference,
  ctx: PassContext,
): Promise<string> {
  const page = `https://imgur.com/${reference.scheme}${reference.hash}/embed?pub=true`;
  const body = await ctx.collaborators.fetchResource(page);
  const $ = load(body.toString("utf-8"));
  const src = $("#image img.post").attr("src");

  const match = src ? IMGUR_URL_PATTERN.exec(src) : null;
  const image = match ? toReference(match) : null;
  if (!image) {
    throw new CollaboratorError(
      "fetchResource",
      `Could not find an image source in ${page}`,
    );
  }
  return directUrl(image.hash, image.ext ?? "");
}

async function resolveEmbed(
  match: RegExpExecArray,
  article: Article,
  ctx: PassContext,
): Promise<string | null> {
  const reference = toReference(match);
  if (!reference) return null;
  if (reference.ext) return directUrl(reference.hash, reference.ext);

  try {
    return await scrapeImgurImage(reference, ctx);
  } catch (error) {
    reportFailure(ctx, article, embedsPass.name, match[0], error);
    return null;
  }
}

export const embedsPass: Pass = {
  name: "embeds",

  async run(article, ctx) {
    for (const text of editableText(article.content, ["verbatim"])) {
      await spliceAllAsync(text, IMGUR_EMBED_PATTERN, async (match) => {
        const src = await resolveEmbed(match, article, ctx);
        return src ? createElement("img", { src }) : null;
      });
    }
  },
};
