/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  directory: z.string(),
  extension: z.string().startsWith("."),
  // Ordering key used as the document "creation time"
  orderBy: z.enum(["birthtime", "mtime"]),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
});

export const StyleConfigSchema = z.object({
  path: z.string(),
});

export const SiteConfigSchema = z.object({
  // Prefix for every page URL in the index (e.g. "./" or "/blog/")
  baseUrl: z.string(),
  title: z.string(),
});

export const TemplatesConfigSchema = z.object({
  // Paths to Handlebars templates; null means use the built-in default
  page: z.string().nullable(),
  index: z.string().nullable(),
});

export const MarkdownConfigSchema = z.object({
  footnotes: z.boolean(),
  smartypants: z.boolean(),
  breaks: z.boolean(),
});

export const TitlesConfigSchema = z.object({
  // What to do with a document that has no level-1 heading
  missing: z.enum(["filename", "skip"]),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const BuildConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  style: StyleConfigSchema,
  site: SiteConfigSchema,
  templates: TemplatesConfigSchema,
  markdown: MarkdownConfigSchema,
  titles: TitlesConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialBuildConfigSchema = BuildConfigSchema.partial().extend({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  style: StyleConfigSchema.partial().optional(),
  site: SiteConfigSchema.partial().optional(),
  templates: TemplatesConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  titles: TitlesConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type StyleConfig = z.infer<typeof StyleConfigSchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type TitlesConfig = z.infer<typeof TitlesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type PartialBuildConfig = z.infer<typeof PartialBuildConfigSchema>;
export type OrderBy = InputConfig["orderBy"];
export type LogLevel = LoggingConfig["level"];

export interface ConfigError {
  path: string;
  error: unknown;
}
