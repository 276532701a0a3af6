/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ExportConfigSchema = z.object({
  // Category an article needs before it is included in an issue
  approvedCategory: z.string(),
  // Post meta keys carrying the optional article fields
  metaKeys: z.object({
    subtitle: z.string(),
    author: z.string(),
    postscript: z.string(),
  }),
});

export const OutputConfigSchema = z.object({
  file: z.string(),
  assets: z.string(),
});

export const ImagesConfigSchema = z.object({
  width: z.number().int().positive(), // Target width in pixels
  dpi: z.number().int().positive(),
  timeout: z.number().int().positive(), // In milliseconds
  retries: z.number().int().nonnegative(),
  userAgent: z.string(),
});

export const MathConfigSchema = z.object({
  compiler: z.string(),
  packages: z.array(z.string()),
  // Extra preamble lines, e.g. "\\newcommand{\\R}{\\mathbb{R}}"
  macros: z.array(z.string()),
});

export const CodeConfigSchema = z.object({
  // Maps language names used by authors to highlighter grammar names
  aliases: z.record(z.string(), z.string()),
});

export const QuoteListsConfigSchema = z.object({
  titles: z.array(z.string()),
  tag: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  export: ExportConfigSchema,
  output: OutputConfigSchema,
  images: ImagesConfigSchema,
  math: MathConfigSchema,
  code: CodeConfigSchema,
  quoteLists: QuoteListsConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial().extend({
  export: ExportConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  images: ImagesConfigSchema.partial().optional(),
  math: MathConfigSchema.partial().optional(),
  code: CodeConfigSchema.partial().optional(),
  quoteLists: QuoteListsConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type ExportConfig = z.infer<typeof ExportConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;
export type MathConfig = z.infer<typeof MathConfigSchema>;
export type CodeConfig = z.infer<typeof CodeConfigSchema>;
export type QuoteListsConfig = z.infer<typeof QuoteListsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<typeof PartialConversionConfigSchema>;
