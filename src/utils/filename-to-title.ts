/**
 * Convert a filename to a readable title
 * Drops the extension and numeric prefix, splits by hyphens/underscores, and capitalizes each word
 *
 * @example
 * filenameToTitle("01-hello-world.md") // "Hello World"
 * filenameToTitle("release_notes") // "Release Notes"
 */
export function filenameToTitle(filename: string): string {
  return filename
    .replace(/\.[^.]+$/, "")
    .replace(/^\d+-/, "")
    .split(/[-_]/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
