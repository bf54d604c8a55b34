/**
 * Markdown converter
 * Turns one document into an HTML fragment and derives its title
 */

import { Marked, type Token, type Tokens } from "marked";
import markedFootnote from "marked-footnote";
import { markedSmartypants } from "marked-smartypants";
import { load } from "cheerio";
import type { ConvertedDocument, MarkdownConfig } from "../types";

export interface MarkdownConverter {
  convert(markdown: string): Promise<ConvertedDocument>;
}

function isTitleHeading(token: Token): token is Tokens.Heading {
  return token.type === "heading" && token.depth === 1;
}

/**
 * Reduce rendered inline HTML to plain text (tags dropped, entities decoded)
 */
function toPlainText(html: string): string {
  const $ = load(html, null, false);
  return collapse($.root().text());
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * First <h1> of a rendered fragment, for headings written as raw HTML
 */
function firstHeadingText(html: string): string {
  const $ = load(html, null, false);
  return collapse($("h1").first().text());
}

/**
 * Create a converter with GFM (tables, strikethrough, task lists),
 * footnotes and smart punctuation
 *
 * The first level-1 heading is picked up while marked walks the token
 * stream. Headings written as raw HTML are looked up in the fragment.
 */
export function createMarkdownConverter(
  config: MarkdownConfig,
): MarkdownConverter {
  const headings: Tokens.Heading[] = [];

  const md = new Marked({ gfm: true, breaks: config.breaks });

  if (config.footnotes) {
    md.use(markedFootnote());
  }

  if (config.smartypants) {
    md.use(markedSmartypants());
  }

  md.use({
    walkTokens(token) {
      // Tokens are visited in document order
      if (headings.length === 0 && isTitleHeading(token)) {
        headings.push(token);
      }
    },
  });

  async function convert(markdown: string): Promise<ConvertedDocument> {
    headings.length = 0;
    const html = await md.parse(markdown);
    const heading = headings.at(0);

    if (!heading) {
      // Raw HTML headings never become heading tokens
      return { html, title: firstHeadingText(html) || null };
    }

    // Render the tokens already lexed; footnote refs only resolve in the
    // lexer that saw the whole document
    const tokens = heading.tokens.filter(
      (token) => token.type !== "footnoteRef",
    );
    const title = toPlainText(md.Parser.parseInline(tokens, md.defaults));
    return { html, title: title || null };
  }

  return { convert };
}
