/**
 * Processor Module
 * Converts and renders documents one at a time, writing each page immediately
 */

import { readFile, writeFile } from "fs/promises";
import { join, resolve } from "node:path";
import { createMarkdownConverter, type MarkdownConverter } from "../markdown";
import { loadPageTemplate, type LoadedTemplate } from "../templates";
import { filenameToTitle, outputFilename } from "../utils";
import type {
  BuildContext,
  ConvertedDocument,
  PageLink,
  PageTemplateContext,
  ProcessResult,
  SourceDocument,
  StyleAsset,
} from "../types";

export interface DocumentRenderer {
  converter: MarkdownConverter;
  template: LoadedTemplate<PageTemplateContext>;
  style: StyleAsset;
}

export interface RenderedPage {
  link: PageLink;
  outputPath: string;
}

/**
 * Run one document through read → convert → render → write
 *
 * Returns null when the document hits a recoverable error; the issue is
 * tracked and the run continues. Template failures are thrown.
 */
export async function processDocument(
  ctx: BuildContext,
  renderer: DocumentRenderer,
  doc: SourceDocument,
): Promise<RenderedPage | null> {
  const { config, tracker, logger } = ctx;

  // 1. Read source
  let markdown: string;
  try {
    markdown = await readFile(doc.sourcePath, "utf-8");
  } catch (error) {
    tracker.trackError(doc.sourcePath, error, "file", "read");
    tracker.incrementFailed();
    logger.warn(`Skipping ${doc.fileName}: could not read source`);
    return null;
  }

  // 2. Convert to HTML and derive the title
  let converted: ConvertedDocument;
  try {
    converted = await renderer.converter.convert(markdown);
  } catch (error) {
    tracker.trackError(doc.sourcePath, error, "file", "parse");
    tracker.incrementFailed();
    logger.warn(`Skipping ${doc.fileName}: conversion failed`);
    return null;
  }

  let title = converted.title;
  if (title === null) {
    if (config.titles.missing === "skip") {
      tracker.trackSkipped(doc.sourcePath, "no level-1 heading");
      logger.warn(`Skipping ${doc.fileName}: no level-1 heading`);
      return null;
    }
    title = filenameToTitle(doc.fileName);
    logger.warn(
      `${doc.fileName} has no level-1 heading, using "${title}" as title`,
    );
  }
  doc.title = title;

  // 3. Render page
  const fileName = outputFilename(doc.fileName);
  const html = renderer.template.render({
    title,
    css: renderer.style.css,
    content: converted.html,
    fileName,
  });

  // 4. Write page
  const outputPath = join(resolve(config.output.directory), fileName);
  try {
    await writeFile(outputPath, html, "utf-8");
  } catch (error) {
    tracker.trackError(outputPath, error, "file", "write");
    tracker.incrementFailed();
    logger.error(`Could not write ${outputPath}`, error);
    return null;
  }

  tracker.incrementSuccessful();
  logger.info(`Wrote ${outputPath}`);

  return {
    link: { title, url: `${config.site.baseUrl}${fileName}` },
    outputPath,
  };
}

/**
 * Renders every discovered document in order
 *
 * Reads from context:
 * - style (style loader)
 * - documents (scanner)
 * - templates (optional, loaded here when absent)
 *
 * Returns the page links for the index, in source order.
 */
export async function process(ctx: BuildContext): Promise<ProcessResult> {
  if (!ctx.style || !ctx.documents) {
    throw new Error("Style loader and scanner must run before processor");
  }

  const renderer: DocumentRenderer = {
    converter: createMarkdownConverter(ctx.config.markdown),
    template:
      ctx.templates?.page ?? (await loadPageTemplate(ctx.config.templates)),
    style: ctx.style,
  };

  const result: ProcessResult = { links: [], written: [] };

  for (const doc of ctx.documents) {
    const page = await processDocument(ctx, renderer, doc);
    if (!page) continue;

    result.links.push(page.link);
    result.written.push(page.outputPath);
  }

  return result;
}
