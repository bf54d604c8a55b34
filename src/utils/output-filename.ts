import { parse } from "node:path";

/**
 * Output page name for a source file: same base name, .html extension
 *
 * @example
 * outputFilename("hello.md") // "hello.html"
 */
export function outputFilename(sourceFileName: string): string {
  return `${parse(sourceFileName).name}.html`;
}
