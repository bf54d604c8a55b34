/**
 * Generator - Pipeline driver
 * Runs the modules in sequence and tracks which stage the build reached
 */

import type {
  BuildConfig,
  BuildContext,
  PageLink,
  ProcessingStats,
} from "./types";
import { Logger, Tracker, getOrderingStrategy, validatePaths } from "./utils";
import type { OrderingStrategy } from "./utils";
import { loadTemplates } from "./templates";
import * as modules from "./modules";

export type GeneratorStage =
  | "init"
  | "style-loaded"
  | "sources-discovered"
  | "rendering"
  | "index-rendered"
  | "done"
  | "failed";

export interface GeneratorOptions {
  logger?: Logger;
  tracker?: Tracker;
  // Overrides config.input.orderBy
  ordering?: OrderingStrategy;
}

export interface BuildResult {
  links: PageLink[];
  written: string[];
  indexPath: string;
  stats: ProcessingStats;
}

export class Generator {
  readonly context: BuildContext;
  private currentStage: GeneratorStage = "init";

  constructor(config: BuildConfig, options: GeneratorOptions = {}) {
    this.context = {
      config,
      tracker: options.tracker ?? new Tracker(),
      logger: options.logger ?? new Logger(config.logging.level),
      ordering: options.ordering ?? getOrderingStrategy(config.input.orderBy),
    };
  }

  get stage(): GeneratorStage {
    return this.currentStage;
  }

  /**
   * Run the build pipeline
   * Any thrown error leaves the generator in the "failed" stage
   */
  async run(): Promise<BuildResult> {
    const ctx = this.context;

    try {
      await validatePaths(ctx.config);

      await modules.loadStyle(ctx);
      // Broken templates must fail the run before any page is written
      ctx.templates = await loadTemplates(ctx.config.templates);
      this.currentStage = "style-loaded";

      await modules.scan(ctx);
      this.currentStage = "sources-discovered";

      this.currentStage = "rendering";
      const { links, written } = await modules.process(ctx);

      const indexPath = await modules.indexer(ctx, links);
      this.currentStage = "index-rendered";

      this.currentStage = "done";
      return { links, written, indexPath, stats: ctx.tracker.getStats() };
    } catch (error) {
      this.currentStage = "failed";
      throw error;
    }
  }
}
