import {
  createElement,
  createText,
  findByName,
  isTag,
  isText,
  replaceNode,
} from "../tree";
import type { ChildNode } from "../tree";
import type { Pass } from "../types";

// An image is sometimes bare and sometimes wrapped in a link
const IMAGE_TAGS: ReadonlySet<string> = new Set(["a", "img"]);

function isImage(node: ChildNode): boolean {
  return isTag(node) && IMAGE_TAGS.has(node.name);
}

/**
 * Caption blocks hold their image next to the caption text. The images move
 * out in front and the rest becomes a <figcaption>.
 */
export const captionsPass: Pass = {
  name: "captions",

  run(article) {
    for (const caption of findByName(article.content, ["caption"])) {
      const children = [...caption.children];
      const images = children.filter(isImage);
      const rest = children.filter((child) => !isImage(child));

      // The export puts a space between the image and the caption text
      const [first] = rest;
      if (first && isText(first) && first.data.startsWith(" ")) {
        const trimmed = first.data.slice(1);
        if (trimmed) {
          rest[0] = createText(trimmed);
        } else {
          rest.shift();
        }
      }

      const figcaption = createElement("figcaption", {}, rest);
      replaceNode(caption, [...images, figcaption]);
    }
  },
};
