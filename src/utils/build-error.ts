/**
 * Fatal build errors
 * Anything thrown as a BuildError aborts the whole run
 */

export type BuildErrorReason =
  | "invalid-css-path"
  | "css-read-error"
  | "invalid-sources-path"
  | "invalid-output-path"
  | "template-load-error"
  | "template-render-error"
  | "index-write-error";

const DESCRIPTIONS: Record<BuildErrorReason, string> = {
  "invalid-css-path": "the CSS source path is invalid",
  "css-read-error": "the CSS source file could not be read",
  "invalid-sources-path": "the Markdown sources directory is invalid",
  "invalid-output-path": "the rendered output directory is invalid",
  "template-load-error": "a template could not be loaded",
  "template-render-error": "a template could not be rendered",
  "index-write-error": "the index page could not be written",
};

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export class BuildError extends Error {
  constructor(
    readonly reason: BuildErrorReason,
    readonly path: string,
    cause: unknown,
  ) {
    super(`${DESCRIPTIONS[reason]} (${path}): ${describeCause(cause)}`, {
      cause,
    });
    this.name = "BuildError";
  }
}
