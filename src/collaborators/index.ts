/**
 * Node implementations of the external collaborators
 */

import type { Collaborators, ConversionConfig } from "../types";
import { createCompileMath } from "./compile-math";
import { createFetchResource } from "./fetch-resource";
import { createHighlightCode } from "./highlight-code";
import { createStoreImage } from "./store-image";

export function createNodeCollaborators(
  config: ConversionConfig,
  assetDir: string,
): Collaborators {
  return {
    fetchResource: createFetchResource(config.images),
    storeImage: createStoreImage(config.images, assetDir),
    compileMath: createCompileMath(config.math, assetDir),
    highlightCode: createHighlightCode(config.code),
  };
}

export { buildLatexDocument } from "./compile-math";
export { escapeText, renderTokens, resolveLanguage } from "./highlight-code";
