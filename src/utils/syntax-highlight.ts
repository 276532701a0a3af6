/**
 * Syntax highlight roles
 * Every highlight element in a code block carries one of these tags, so the
 * layout template can style them through a fixed set of character styles
 */

export const SYNTAX_HIGHLIGHT_TYPES = [
  "bold",
  "italic",
  "underline",
  "keyword",
  "string",
  "comment",
  "number",
  "function",
  "operator",
  "punctuation",
  "builtin",
  "variable",
] as const;

export type SyntaxHighlightType = (typeof SYNTAX_HIGHLIGHT_TYPES)[number];

/**
 * Tag name of a highlight role
 *
 * @example
 * getSyntaxHighlightTagName("keyword") // "hl_keyword"
 */
export function getSyntaxHighlightTagName(type: SyntaxHighlightType): string {
  switch (type) {
    case "bold":
      return "hl_bold";
    case "italic":
      return "hl_italic";
    case "underline":
      return "hl_underline";
    case "keyword":
      return "hl_keyword";
    case "string":
      return "hl_string";
    case "comment":
      return "hl_comment";
    case "number":
      return "hl_number";
    case "function":
      return "hl_function";
    case "operator":
      return "hl_operator";
    case "punctuation":
      return "hl_punctuation";
    case "builtin":
      return "hl_builtin";
    case "variable":
      return "hl_variable";
  }
}

