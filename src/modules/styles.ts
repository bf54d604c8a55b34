/**
 * Style Loader Module
 * Reads the CSS source verbatim into a shared style asset
 */

import { readFile } from "fs/promises";
import { resolve } from "node:path";
import { BuildError } from "../utils";
import type { BuildContext } from "../types";

/**
 * Writes to context:
 * - style: CSS text, never modified afterwards
 */
export async function loadStyle(ctx: BuildContext): Promise<void> {
  const path = resolve(ctx.config.style.path);

  let css: string;
  try {
    css = await readFile(path, "utf-8");
  } catch (error) {
    throw new BuildError("css-read-error", path, error);
  }

  ctx.style = Object.freeze({ path, css });
  ctx.logger.debug(`Loaded style ${path} (${css.length} chars)`);
}
