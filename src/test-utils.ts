/**
 * Shared test fixtures: articles built from markup, in-process
 * collaborators and a quiet pass context
 */

import render from "dom-serializer";
import type { AnyNode } from "domhandler";
import { createElement, createText, insertChild, parseDocument } from "./tree";
import type { Article, Collaborators, PassContext } from "./types";
import { Logger } from "./utils/logger";
import { Tracker } from "./utils/tracker";

/**
 * Markup without entity encoding, so expectations stay readable
 */
export function markup(nodes: AnyNode | AnyNode[]): string {
  return render(nodes, { xmlMode: true, encodeEntities: false });
}

export function makeArticle(content: string, fields: Partial<Article> = {}): Article {
  return {
    id: "42",
    title: "Test Article",
    subtitle: "",
    author: "",
    content: parseDocument(content),
    postscript: null,
    ...fields,
  };
}

/** Text that every typographic pass would change outside a link */
export const LINKED_TEXT = 'a - b "c"... “d”. e[1]. 7/10 example.com';

/**
 * An article holding one resolved link. Built by hand, since the parser
 * treats <link> as a void element.
 */
export function makeLinkedArticle(text: string): Article {
  const article = makeArticle("");
  const link = createElement("link", { href: "https://example.org" }, [createText(text)]);
  insertChild(article.content, 0, link);
  return article;
}

/**
 * Collaborators that never leave the process: fetches echo the URL, stores
 * and compiles return a file URL under /assets, highlighting is a no-op
 */
export function fakeCollaborators(overrides: Partial<Collaborators> = {}): Collaborators {
  return {
    fetchResource: async (url) => Buffer.from(url),
    storeImage: async (location) => ({ href: `file:///assets/${location}` }),
    compileMath: async (_source, _displayMode, location) => ({
      href: `file:///assets/${location}.pdf`,
    }),
    highlightCode: (source) => source.replace(/&/g, "&amp;").replace(/</g, "&lt;"),
    ...overrides,
  };
}

export function passContext(collaborators: Collaborators = fakeCollaborators()): PassContext {
  return {
    collaborators,
    logger: new Logger("error"),
    tracker: new Tracker(),
    quoteLists: { titles: ["profQUOTES"], tag: "profquotes" },
  };
}
