/**
 * Central type exports
 */

// Configuration
export type {
  BuildConfig,
  PartialBuildConfig,
  InputConfig,
  OutputConfig,
  StyleConfig,
  SiteConfig,
  TemplatesConfig,
  MarkdownConfig,
  TitlesConfig,
  LoggingConfig,
  OrderBy,
  LogLevel,
  ConfigError,
} from "./config";
export { BuildConfigSchema, PartialBuildConfigSchema } from "./config";

// Files
export type {
  SourceDocument,
  PageLink,
  StyleAsset,
  ConvertedDocument,
  ProcessResult,
  PageTemplateContext,
  IndexTemplateContext,
} from "./files";

// Context
export type { BuildContext } from "./context";

// Tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";
export { Tracker } from "../utils/tracker";
