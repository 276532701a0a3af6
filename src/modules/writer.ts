/**
 * Writer Module
 * Serializes the processed articles into the issue XML file
 */

import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import { createElement, createText, isTag, toXml } from "../tree";
import type { ChildNode } from "../tree";
import type { Article, ConversionContext } from "../types";

/**
 * Content nodes to render, with the author byline placed before the
 * postscript footer (or at the end). The article tree is left untouched.
 */
function contentNodes(article: Article): ChildNode[] {
  const nodes = [...article.content.children];
  if (!article.author) return nodes;

  const address = createElement("address", {}, [createText(article.author)]);
  const footer = nodes.findIndex((node) => isTag(node) && node.name === "footer");
  if (footer === -1) {
    nodes.push(createText("\n"), address);
  } else {
    nodes.splice(footer, 0, address, createText("\n"));
  }
  return nodes;
}

function textElement(name: string, text: string): string {
  return `<${name}>${toXml(createText(text))}</${name}>`;
}

export function renderArticle(article: Article): string {
  const parts = [textElement("title", article.title)];
  if (article.subtitle) {
    parts.push(textElement("subtitle", article.subtitle));
  }
  parts.push(`<content>${toXml(contentNodes(article))}</content>`);
  return `<article>${parts.join("\n")}</article>`;
}

const PREFORMATTED = /(<pre>[\s\S]*?<\/pre>)/;
const BLANK_LINE = /\n[^\S\n]*(?=\n)/g;

/**
 * Blank lines go, since every newline already starts a paragraph, and so do
 * newlines just inside list tags. Preformatted blocks keep theirs.
 */
export function cleanupIssue(xml: string): string {
  return xml
    .split(PREFORMATTED)
    .map((segment, index) => {
      if (index % 2 === 1) return segment;
      return segment.replace(BLANK_LINE, "");
    })
    .join("")
    .replace(/<(ul|ol)>\n/g, "<$1>")
    .replace(/\n<\/(ul|ol)>/g, "</$1>");
}

export function renderIssue(articles: Article[]): string {
  return cleanupIssue(`<issue>${articles.map(renderArticle).join("\n")}</issue>`);
}

/**
 * Reads from context:
 * - processed
 */
export async function write(ctx: ConversionContext): Promise<void> {
  if (!ctx.processed) {
    throw new Error("Processor must run before writer");
  }

  const outputPath = path.resolve(ctx.config.output.file);
  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, renderIssue(ctx.processed), "utf-8");
    ctx.logger.debug(`Wrote ${ctx.processed.length} articles to ${outputPath}`);
  } catch (error) {
    ctx.tracker.trackError(outputPath, error, "file", "write");
  }
}
