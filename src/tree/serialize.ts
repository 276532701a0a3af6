import render from "dom-serializer";
import type { AnyNode } from "domhandler";

// The serializer writes every non-ASCII character as a hex reference
const CHARACTER_REFERENCE = /&#x([0-9a-f]+);/gi;
// Escaped markup characters keep their references
const MARKUP_CODE_POINTS: ReadonlySet<number> = new Set([0x22, 0x26, 0x27, 0x3c, 0x3e]);

/**
 * Render nodes as well-formed XML (custom tags such as <link> keep their
 * children and closing tags). Typographic characters are written as
 * themselves so the issue file stays readable.
 */
export function toXml(nodes: AnyNode | AnyNode[]): string {
  return render(nodes, { xmlMode: true }).replace(
    CHARACTER_REFERENCE,
    (reference, hex: string) => {
      const codePoint = parseInt(hex, 16);
      return MARKUP_CODE_POINTS.has(codePoint) ? reference : String.fromCodePoint(codePoint);
    },
  );
}
