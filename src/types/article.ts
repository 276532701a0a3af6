/**
 * Article type definitions
 */

import type { Document } from "domhandler";

export interface Article {
  id: string; // Post id from the export, unique per article
  title: string;
  subtitle: string; // Empty when the post has none
  author: string; // Empty when the post has none
  content: Document;
  // Merged into content (wrapped in <footer>) before the first pass
  postscript: Document | null;
}
