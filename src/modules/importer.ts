/**
 * Importer Module
 * Reads WordPress (WXR) exports and builds the articles of one issue
 */

import { readFile } from "fs/promises";
import { load } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { parseDocument } from "../tree";
import type { Article, ConversionContext, ExportConfig } from "../types";

// ============================================================================
// Bracket markup
// ============================================================================

const BRACKET_SUBSTITUTIONS: ReadonlyArray<[RegExp, string]> = [
  [/\[caption([^\]]*)\]/g, "<caption$1>"],
  [/\[\/caption\]/g, "</caption>"],
  [/\[(\/?)emphasis 1\]/g, "<$1em>"],
  [/\[(\/?)emphasis ([234])\]/g, "<$1em$2>"],
  [/\[(\/?)em1\]/g, "<$1em>"],
  [/\[(\/?)em([234])\]/g, "<$1em$2>"],
  [/\[(\/?)stress 1\]/g, "<$1strong>"],
  [/\[(\/?)stress 2\]/g, "<$1strong2>"],
  [/\[(\/?)str1\]/g, "<$1strong>"],
  [/\[(\/?)str2\]/g, "<$1strong2>"],
  [/\[(\/?)(?:article|aref)\]/g, "<$1aref>"],
  [/\[(\/?)math\]/g, "<$1imath>"],
];

/**
 * Rewrite the editor's bracket shortcodes into tags before parsing
 *
 * @example
 * preprocessMarkup("[em2]so[/em2]") // "<em2>so</em2>"
 */
export function preprocessMarkup(markup: string): string {
  return BRACKET_SUBSTITUTIONS.reduce(
    (result, [pattern, replacement]) => result.replace(pattern, replacement),
    markup,
  );
}

// ============================================================================
// WXR parsing
// ============================================================================

function childText($item: Cheerio<Element>, selector: string): string {
  return $item.children(selector).first().text();
}

/**
 * True when the item is tagged with the issue and approved for print
 */
export function isForIssue(
  $: CheerioAPI,
  $item: Cheerio<Element>,
  issue: string,
  approvedCategory: string,
): boolean {
  const categories = $item
    .children("category")
    .toArray()
    .map((category) => $(category));
  const has = (domain: string, text: string) =>
    categories.some(($c) => $c.attr("domain") === domain && $c.text() === text);

  const tagged = has("post_tag", issue);
  const approved = has("category", approvedCategory);
  return tagged && approved;
}

function readPostMeta($: CheerioAPI, $item: Cheerio<Element>): Map<string, string> {
  const meta = new Map<string, string>();
  $item.children("wp\\:postmeta").each((_, element) => {
    const $meta = $(element);
    meta.set(childText($meta, "wp\\:meta_key"), childText($meta, "wp\\:meta_value"));
  });
  return meta;
}

function toArticle($: CheerioAPI, $item: Cheerio<Element>, config: ExportConfig): Article {
  const meta = readPostMeta($, $item);
  const postscript = meta.get(config.metaKeys.postscript) ?? "";

  return {
    id: childText($item, "wp\\:post_id"),
    title: childText($item, "title") || "[no title]",
    subtitle: meta.get(config.metaKeys.subtitle) ?? "",
    author: meta.get(config.metaKeys.author) ?? "",
    content: parseDocument(preprocessMarkup(childText($item, "content\\:encoded"))),
    postscript: postscript.trim() ? parseDocument(preprocessMarkup(postscript)) : null,
  };
}

/**
 * Articles of `issue` in one export, in export order
 */
export function parseExport(xml: string, issue: string, config: ExportConfig): Article[] {
  const $ = load(xml, { xml: true });

  return $("item")
    .toArray()
    .map((item) => $(item))
    .filter(($item) => isForIssue($, $item, issue, config.approvedCategory))
    .map(($item) => toArticle($, $item, config));
}

// ============================================================================
// Module
// ============================================================================

/**
 * Reads from context:
 * - exportFiles
 *
 * Writes to context:
 * - articles
 */
export async function importArticles(ctx: ConversionContext): Promise<void> {
  if (!ctx.exportFiles) {
    throw new Error("Scanner must run before importer");
  }

  const { config, issue, logger, tracker } = ctx;
  const articles: Article[] = [];

  for (const file of ctx.exportFiles) {
    let xml: string;
    try {
      xml = await readFile(file, "utf-8");
    } catch (error) {
      tracker.trackError(file, error, "file", "read");
      continue;
    }

    try {
      const found = parseExport(xml, issue, config.export);
      logger.debug(`${file}: ${found.length} articles for ${issue}`);
      articles.push(...found);
    } catch (error) {
      tracker.trackError(file, error, "file", "parse");
    }
  }

  tracker.setTotalArticles(articles.length);
  ctx.articles = articles;
}
