/**
 * Build context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { BuildConfig } from "./config";
import type {
  IndexTemplateContext,
  PageTemplateContext,
  SourceDocument,
  StyleAsset,
} from "./files";
import type { LoadedTemplate } from "../templates";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { OrderingStrategy } from "../utils/ordering";

export interface BuildContext {
  // Input - provided at initialization
  config: BuildConfig;

  // Unified tracking for stats and per-document issues
  tracker: Tracker;
  logger: Logger;

  // Produces the creation timestamp of each discovered file
  ordering: OrderingStrategy;

  style?: StyleAsset; // Style loader
  templates?: {
    page: LoadedTemplate<PageTemplateContext>;
    index: LoadedTemplate<IndexTemplateContext>;
  };
  documents?: SourceDocument[]; // Scanner - sorted by createdAt
}
