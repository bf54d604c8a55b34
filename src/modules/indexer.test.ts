import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { indexer } from "./indexer";
import {
  Logger,
  Tracker,
  getOrderingStrategy,
  loadDefaultConfig,
  mergeConfig,
} from "../utils";
import type { BuildContext, PartialBuildConfig } from "../types";

function countRows(html: string): number {
  return (html.match(/class="row-item"/g) ?? []).length;
}

describe("indexer", () => {
  let outputDir: string;

  async function createContext(
    overrides: PartialBuildConfig = {},
  ): Promise<BuildContext> {
    const config = mergeConfig(await loadDefaultConfig(), {
      output: { directory: outputDir },
      ...overrides,
    });
    return {
      config,
      tracker: new Tracker(),
      logger: new Logger("silent"),
      ordering: getOrderingStrategy(config.input.orderBy),
    };
  }

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), "mdblog-index-"));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it("writes index.html listing every page in the given order", async () => {
    const ctx = await createContext();

    const path = await indexer(ctx, [
      { title: "Bravo", url: "./bravo.html" },
      { title: "Alpha", url: "./alpha.html" },
    ]);

    expect(path).toBe(join(outputDir, "index.html"));
    const html = await readFile(path, "utf-8");
    expect(countRows(html)).toBe(2);

    const bravo = html.indexOf('<a href="./bravo.html">Bravo</a>');
    const alpha = html.indexOf('<a href="./alpha.html">Alpha</a>');
    expect(bravo).toBeGreaterThan(-1);
    expect(alpha).toBeGreaterThan(bravo);
    expect(ctx.tracker.getStats().createdIndexes).toBe(1);
  });

  it("writes an index without links when there are no pages", async () => {
    const ctx = await createContext();

    const path = await indexer(ctx, []);

    const html = await readFile(path, "utf-8");
    expect(countRows(html)).toBe(0);
    expect(html).toContain("<title>Posts</title>");
  });

  it("escapes page titles", async () => {
    const ctx = await createContext();

    const path = await indexer(ctx, [
      { title: "Tom & Jerry", url: "./tom.html" },
    ]);

    const html = await readFile(path, "utf-8");
    expect(html).toContain('<a href="./tom.html">Tom &amp; Jerry</a>');
  });

  it("renders a custom index template", async () => {
    const templatePath = join(outputDir, "index.hbs");
    await writeFile(
      templatePath,
      "{{title}}:{{#each pages}}{{title}}|{{/each}}",
      "utf-8",
    );
    const ctx = await createContext({
      site: { title: "Notes" },
      templates: { index: templatePath },
    });

    const path = await indexer(ctx, [
      { title: "A", url: "./a.html" },
      { title: "B", url: "./b.html" },
    ]);

    expect(await readFile(path, "utf-8")).toBe("Notes:A|B|");
  });

  it("fails the run when the index cannot be written", async () => {
    const ctx = await createContext({
      output: { directory: join(outputDir, "missing") },
    });

    await expect(indexer(ctx, [])).rejects.toMatchObject({
      reason: "index-write-error",
      path: join(outputDir, "missing", "index.html"),
    });
  });
});
