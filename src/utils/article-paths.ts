/**
 * Article asset locations
 * All paths are relative to the asset directory
 */

import path from "node:path";
import type { Article } from "../types/article";

/**
 * Build a filesystem-safe slug from the start of the title plus the id,
 * which keeps articles with similar titles apart
 *
 * @example
 * getArticleSlug({ title: "Hello World, again", id: "42", ... }) // "Hello_Worl_42"
 */
export function getArticleSlug(article: Pick<Article, "title" | "id">): string {
  const prefix = article.title
    .slice(0, 10)
    .replace(/[^\x00-\x7F]/g, "")
    .replace(/ /g, "_")
    .replace(/\W/g, "");
  return `${prefix}_${article.id}`;
}

/**
 * Location of the `index`-th image of an article
 *
 * @example
 * getImageLocation(article, "cat.png", 7) // "img/Hello_Worl_42_007_cat.png"
 */
export function getImageLocation(
  article: Pick<Article, "title" | "id">,
  file: string,
  index: number,
): string {
  const filename = `${getArticleSlug(article)}_${String(index).padStart(3, "0")}_${file}`;
  return path.posix.join("img", filename);
}

/**
 * Location of a compiled formula, without the extension the compiler adds
 */
export function getPdfLocation(
  article: Pick<Article, "title" | "id">,
  file: string,
): string {
  return path.posix.join("pdf", `${getArticleSlug(article)}_${file}`);
}
