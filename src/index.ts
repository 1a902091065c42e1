export { createRewriter } from "./createRewriter";
export type { RewriterDependencies } from "./createRewriter";
export { DocumentRewriter } from "./includes/DocumentRewriter";
export { IncludeScanner } from "./includes/IncludeScanner";
export { normalizeCommentLine, normalizeLines } from "./includes/normalize";
export { AtomicFileWriter } from "./includes/io/AtomicFileWriter";
export { ScanState, CLOSING_FENCE, markerTag, openingFence } from "./includes/types";
export type {
  IncludeRecord,
  RenderResult,
  RewriteError,
  RewriteErrorKind,
  RewriteOptions,
  RewriteResult,
} from "./includes/types";
export type { IFileSystem } from "./includes/abstractions/IFileSystem";
export type { IClock } from "./includes/abstractions/IClock";
export { NodeFileSystem } from "./includes/abstractions/NodeFileSystem";
export { InMemoryFileSystem } from "./includes/abstractions/InMemoryFileSystem";
export { SystemClock } from "./includes/abstractions/SystemClock";
export { FixedClock } from "./includes/abstractions/FixedClock";
export { resolveConfig, defaultConfig } from "./config";
export type { RewriterConfig, RewriterConfigOverrides } from "./config";
export { ConsoleLogger, InMemoryLogger } from "./logging";
export type { ILogger, LogLevel } from "./logging";
