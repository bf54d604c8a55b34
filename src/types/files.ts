/**
 * Document and page type definitions
 */

export interface SourceDocument {
  // Scanner fills these fields:
  fileName: string; // Base name with extension (e.g. "hello.md")
  sourcePath: string; // Absolute path to the Markdown source
  createdAt: Date; // Ordering key, assigned once at discovery

  // Processor fills this field (after conversion):
  title?: string;
}

/**
 * One successfully written page, as listed in the index
 */
export interface PageLink {
  title: string;
  url: string; // baseUrl + output file name (e.g. "./hello.html")
}

/**
 * CSS text shared read-only by every page render
 */
export type StyleAsset = Readonly<{
  path: string;
  css: string;
}>;

/**
 * Result of converting one Markdown document
 * title is null when the document has no level-1 heading
 */
export interface ConvertedDocument {
  html: string;
  title: string | null;
}

/**
 * Accumulated output of the per-document stage
 */
export interface ProcessResult {
  links: PageLink[];
  written: string[]; // Absolute paths of the pages written
}

// ============================================================================
// Template Context Types
// ============================================================================

/**
 * Context passed to page templates
 * Available variables in a custom page template
 */
export interface PageTemplateContext {
  title: string;
  css: string;
  content: string; // HTML fragment converted from Markdown
  fileName: string; // Output file name (e.g. "hello.html")
}

/**
 * Context passed to the index template
 */
export interface IndexTemplateContext {
  title: string; // Site title
  pages: PageLink[];
}
