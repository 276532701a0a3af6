/**
 * Code highlighter
 * Prism tokens are mapped onto the fixed set of highlight roles
 */

import Prism from "prismjs";
import type { Grammar, Token, TokenStream } from "prismjs";
import loadLanguages from "prismjs/components/index.js";
import type { CodeConfig, Collaborators } from "../types";
import { CollaboratorError } from "../utils/errors";
import { getSyntaxHighlightTagName } from "../utils/syntax-highlight";
import type { SyntaxHighlightType } from "../utils/syntax-highlight";

const TOKEN_ROLES: Record<string, SyntaxHighlightType> = {
  keyword: "keyword",
  string: "string",
  char: "string",
  "template-string": "string",
  regex: "string",
  "attr-value": "string",
  comment: "comment",
  prolog: "comment",
  doctype: "comment",
  cdata: "comment",
  number: "number",
  boolean: "number",
  constant: "number",
  function: "function",
  "function-definition": "function",
  "class-name": "function",
  operator: "operator",
  punctuation: "punctuation",
  builtin: "builtin",
  tag: "builtin",
  selector: "builtin",
  "attr-name": "builtin",
  variable: "variable",
  property: "variable",
  parameter: "variable",
};

export function escapeText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function tokenRole(token: Token): SyntaxHighlightType | undefined {
  const aliases = Array.isArray(token.alias) ? token.alias : [token.alias];
  for (const name of [token.type, ...aliases]) {
    if (name && name in TOKEN_ROLES) return TOKEN_ROLES[name];
  }
  return undefined;
}

/**
 * Render a token stream as text with hl_* elements
 */
export function renderTokens(stream: TokenStream): string {
  if (typeof stream === "string") return escapeText(stream);
  if (Array.isArray(stream)) return stream.map(renderTokens).join("");

  const inner = renderTokens(stream.content);
  const role = tokenRole(stream);
  if (!role) return inner;

  const tag = getSyntaxHighlightTagName(role);
  return `<${tag}>${inner}</${tag}>`;
}

/** Grammar name for a language as authors write it, e.g. "py" -> "python" */
export function resolveLanguage(raw: string, aliases: CodeConfig["aliases"]): string {
  const name = raw.trim().toLowerCase();
  return aliases[name] ?? name;
}

export function createHighlightCode(config: CodeConfig): Collaborators["highlightCode"] {
  return (source, options) => {
    const lang = typeof options.lang === "string" ? resolveLanguage(options.lang, config.aliases) : "";
    if (!lang) return escapeText(source);

    try {
      loadLanguages([lang]);
      const grammar: Grammar | undefined = Prism.languages[lang];
      if (!grammar) return escapeText(source);
      return renderTokens(Prism.tokenize(source, grammar));
    } catch (error) {
      throw new CollaboratorError("highlightCode", `Could not highlight ${lang} code`, {
        cause: error,
      });
    }
  };
}
