/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { resolve } from "node:path";
import { getDefaultIndexTemplate, getDefaultPageTemplate } from "./defaults";
import { BuildError } from "../utils/build-error";
import type {
  IndexTemplateContext,
  PageTemplateContext,
  TemplatesConfig,
} from "../types";

/**
 * A compiled template and where it came from
 */
export interface LoadedTemplate<T> {
  source: string;
  render(context: T): string;
}

/**
 * Load and compile a template from file path or use default
 * Unreadable or syntactically broken templates are fatal
 */
export async function loadTemplate<T>(
  templatePath: string | null,
  defaultTemplate: string,
  label: string,
): Promise<LoadedTemplate<T>> {
  const source =
    templatePath === null ? `<built-in ${label}>` : resolve(templatePath);

  let template: HandlebarsTemplateDelegate<T>;
  try {
    const content =
      templatePath === null
        ? defaultTemplate
        : await readFile(source, "utf-8");
    // compile() is lazy; parse() surfaces syntax errors now
    Handlebars.parse(content);
    template = Handlebars.compile<T>(content);
  } catch (error) {
    throw new BuildError("template-load-error", source, error);
  }

  return {
    source,
    render(context: T): string {
      try {
        return template(context);
      } catch (error) {
        throw new BuildError("template-render-error", source, error);
      }
    },
  };
}

/**
 * Load page template (configured path or default)
 */
export async function loadPageTemplate(
  config: TemplatesConfig,
): Promise<LoadedTemplate<PageTemplateContext>> {
  return loadTemplate<PageTemplateContext>(
    config.page,
    getDefaultPageTemplate(),
    "page",
  );
}

/**
 * Load page and index templates up front
 */
export async function loadTemplates(config: TemplatesConfig): Promise<{
  page: LoadedTemplate<PageTemplateContext>;
  index: LoadedTemplate<IndexTemplateContext>;
}> {
  return {
    page: await loadPageTemplate(config),
    index: await loadIndexTemplate(config),
  };
}

/**
 * Load index template (configured path or default)
 */
export async function loadIndexTemplate(
  config: TemplatesConfig,
): Promise<LoadedTemplate<IndexTemplateContext>> {
  return loadTemplate<IndexTemplateContext>(
    config.index,
    getDefaultIndexTemplate(),
    "index",
  );
}
