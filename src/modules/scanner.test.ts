import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, utimes, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { scan } from "./scanner";
import {
  BuildError,
  Logger,
  Tracker,
  getOrderingStrategy,
  loadDefaultConfig,
  mergeConfig,
  type OrderingStrategy,
} from "../utils";
import type { BuildContext, PartialBuildConfig } from "../types";

async function createContext(
  overrides: PartialBuildConfig,
  ordering?: OrderingStrategy,
): Promise<BuildContext> {
  const config = mergeConfig(await loadDefaultConfig(), overrides);
  return {
    config,
    tracker: new Tracker(),
    logger: new Logger("silent"),
    ordering: ordering ?? getOrderingStrategy(config.input.orderBy),
  };
}

async function writeSource(
  dir: string,
  name: string,
  modified?: string,
): Promise<void> {
  const path = join(dir, name);
  await writeFile(path, `# ${name}\n`, "utf-8");
  if (modified) {
    const time = new Date(modified);
    await utimes(path, time, time);
  }
}

describe("scan", () => {
  let sourceDir: string;

  beforeEach(async () => {
    sourceDir = await mkdtemp(join(tmpdir(), "mdblog-scan-"));
  });

  afterEach(async () => {
    await rm(sourceDir, { recursive: true, force: true });
  });

  it("orders documents by timestamp, oldest first", async () => {
    await writeSource(sourceDir, "c.md", "2024-01-01T00:00:00Z");
    await writeSource(sourceDir, "a.md", "2024-03-01T00:00:00Z");
    await writeSource(sourceDir, "b.md", "2024-02-01T00:00:00Z");

    const ctx = await createContext({
      input: { directory: sourceDir, orderBy: "mtime" },
    });
    await scan(ctx);

    expect(ctx.documents?.map((doc) => doc.fileName)).toEqual([
      "c.md",
      "b.md",
      "a.md",
    ]);
    expect(ctx.documents?.[0]?.createdAt.toISOString()).toBe(
      "2024-01-01T00:00:00.000Z",
    );
    expect(ctx.documents?.[0]?.sourcePath).toBe(join(sourceDir, "c.md"));
    expect(ctx.documents?.[0]?.title).toBeUndefined();
  });

  it("breaks timestamp ties by file name", async () => {
    await writeSource(sourceDir, "beta.md", "2024-01-01T00:00:00Z");
    await writeSource(sourceDir, "gamma.md", "2024-01-01T00:00:00Z");
    await writeSource(sourceDir, "alpha.md", "2024-01-01T00:00:00Z");

    const ctx = await createContext({
      input: { directory: sourceDir, orderBy: "mtime" },
    });
    await scan(ctx);

    expect(ctx.documents?.map((doc) => doc.fileName)).toEqual([
      "alpha.md",
      "beta.md",
      "gamma.md",
    ]);
  });

  it("only picks up Markdown files directly inside the directory", async () => {
    await writeSource(sourceDir, "post.md");
    await writeSource(sourceDir, "notes.txt");
    await writeSource(sourceDir, ".hidden.md");
    await mkdir(join(sourceDir, "drafts"));
    await writeSource(join(sourceDir, "drafts"), "draft.md");

    const ctx = await createContext({ input: { directory: sourceDir } });
    await scan(ctx);

    expect(ctx.documents?.map((doc) => doc.fileName)).toEqual(["post.md"]);
    expect(ctx.tracker.getStats().totalFiles).toBe(1);
  });

  it("uses an injected ordering strategy", async () => {
    await writeSource(sourceDir, "first.md");
    await writeSource(sourceDir, "second.md");

    const dates: Record<string, Date> = {
      "first.md": new Date("2020-05-01T00:00:00Z"),
      "second.md": new Date("2019-05-01T00:00:00Z"),
    };
    const ctx = await createContext(
      { input: { directory: sourceDir } },
      ({ fileName }) => dates[fileName] ?? new Date(0),
    );
    await scan(ctx);

    expect(ctx.documents?.map((doc) => doc.fileName)).toEqual([
      "second.md",
      "first.md",
    ]);
  });

  it("drops a file whose metadata cannot be read", async () => {
    await writeSource(sourceDir, "good.md");
    await writeSource(sourceDir, "broken.md");

    const ctx = await createContext(
      { input: { directory: sourceDir } },
      ({ fileName }) => {
        if (fileName === "broken.md") throw new Error("no timestamp");
        return new Date("2024-01-01T00:00:00Z");
      },
    );
    await scan(ctx);

    expect(ctx.documents?.map((doc) => doc.fileName)).toEqual(["good.md"]);

    const stats = ctx.tracker.getStats();
    expect(stats.totalFiles).toBe(2);
    expect(stats.failedFiles).toBe(1);
    expect(ctx.tracker.getIssues("file")).toEqual([
      {
        type: "file",
        path: join(sourceDir, "broken.md"),
        reason: "metadata-error",
        details: "no timestamp",
      },
    ]);
  });

  it("returns an empty list for a directory without Markdown files", async () => {
    const ctx = await createContext({ input: { directory: sourceDir } });
    await scan(ctx);

    expect(ctx.documents).toEqual([]);
  });

  it("fails the run when the directory is missing", async () => {
    const ctx = await createContext({
      input: { directory: join(sourceDir, "missing") },
    });

    const result = scan(ctx);
    await expect(result).rejects.toBeInstanceOf(BuildError);
    await expect(result).rejects.toMatchObject({
      reason: "invalid-sources-path",
      path: join(sourceDir, "missing"),
    });
  });

  it("fails the run when the path is a file", async () => {
    await writeSource(sourceDir, "post.md");
    const ctx = await createContext({
      input: { directory: join(sourceDir, "post.md") },
    });

    await expect(scan(ctx)).rejects.toMatchObject({
      reason: "invalid-sources-path",
    });
  });
});
