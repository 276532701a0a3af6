import { describe, expect, it } from "vitest";
import { markup } from "../test-utils";
import { StructuralError } from "../utils/errors";
import { createElement, createText, isText, parseDocument, textNodes } from "./index";
import type { Text } from "./index";
import { splice, spliceAll, spliceAllAsync } from "./splice";

function firstText(markupSource: string) {
  const doc = parseDocument(markupSource);
  const [text] = textNodes(doc);
  return { doc, text };
}

function outsideMatches(data: string, pattern: RegExp): string {
  return data.replace(new RegExp(pattern.source, "g"), "");
}

describe("splice", () => {
  it("replaces the range with the element and returns the suffix", () => {
    const { doc, text } = firstText("one two three");

    const suffix = splice(text, 4, 7, createElement("b", {}, [createText("2")]));

    expect(markup(doc)).toBe("one <b>2</b> three");
    expect(suffix?.data).toBe(" three");
    expect(suffix?.parent).toBe(doc);
  });

  it("never inserts empty prefix or suffix nodes", () => {
    const { doc, text } = firstText("word");

    const suffix = splice(text, 0, 4, createElement("b"));

    expect(suffix).toBeNull();
    expect(doc.children).toHaveLength(1);
  });

  it("splices text nested inside elements", () => {
    const { doc, text } = firstText("<p>a[1]b</p>");

    splice(text, 1, 4, createElement("sup"));

    expect(markup(doc)).toBe("<p>a<sup/>b</p>");
  });

  it("rejects a range outside the payload", () => {
    const { text } = firstText("abc");
    expect(() => splice(text, 2, 5, createElement("b"))).toThrow(StructuralError);
    expect(() => splice(text, 2, 1, createElement("b"))).toThrow(StructuralError);
  });

  it("rejects a detached text node", () => {
    expect(() => splice(createText("abc"), 0, 1, createElement("b"))).toThrow(
      StructuralError,
    );
  });
});

describe("spliceAll", () => {
  it("splices every match of the original string in order", () => {
    const { doc, text } = firstText("x [1] y [2] z");

    spliceAll(text, /\[(\d)\]/, (match) => createElement("sup", {}, [createText(match[1])]));

    expect(markup(doc)).toBe("x <sup>1</sup> y <sup>2</sup> z");
  });

  it("conserves the text outside the matches", () => {
    const pattern = /`[^`]+`/;
    const source = "a `b` c `d` e";
    const { doc, text } = firstText(source);

    spliceAll(text, pattern, () => createElement("code"));

    const remaining = doc.children
      .filter((node): node is Text => isText(node))
      .map((node) => node.data)
      .join("");
    expect(remaining).toBe(outsideMatches(source, pattern));
  });

  it("does not rescan the inserted elements", () => {
    const { doc, text } = firstText("aa");

    spliceAll(text, /a/, () => createElement("b", {}, [createText("a")]));

    expect(markup(doc)).toBe("<b>a</b><b>a</b>");
  });

  it("leaves a match as text when the builder returns null", () => {
    const { doc, text } = firstText("[1] [x] [2]");

    spliceAll(text, /\[(\w)\]/, (match) =>
      /\d/.test(match[1]) ? createElement("sup", {}, [createText(match[1])]) : null,
    );

    expect(markup(doc)).toBe("<sup>1</sup> [x] <sup>2</sup>");
  });

  it("supports zero-width matches", () => {
    const { doc, text } = firstText("a\nb\nc");

    spliceAll(text, /(?<=\n)/, () => createElement("n"));

    expect(markup(doc)).toBe("a\n<n/>b\n<n/>c");
  });
});

describe("spliceAllAsync", () => {
  it("awaits each builder in match order", async () => {
    const { doc, text } = firstText("$a$ and $b$");
    const seen: string[] = [];

    await spliceAllAsync(text, /\$(\w)\$/, async (match) => {
      seen.push(match[1]);
      return createElement("m", {}, [createText(match[1])]);
    });

    expect(seen).toEqual(["a", "b"]);
    expect(markup(doc)).toBe("<m>a</m> and <m>b</m>");
  });
});
