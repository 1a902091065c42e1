import { IClock } from "./includes/abstractions/IClock";
import { IFileSystem } from "./includes/abstractions/IFileSystem";
import { NodeFileSystem } from "./includes/abstractions/NodeFileSystem";
import { SystemClock } from "./includes/abstractions/SystemClock";
import { DocumentRewriter } from "./includes/DocumentRewriter";
import { AtomicFileWriter } from "./includes/io/AtomicFileWriter";
import { resolveConfig, RewriterConfigOverrides } from "./config";
import { ConsoleLogger, ILogger } from "./logging";

export interface RewriterDependencies {
  fs?: IFileSystem;
  clock?: IClock;
  logger?: ILogger;
  cwd?: string;
  config?: RewriterConfigOverrides;
}

/** Wires a DocumentRewriter; anything not supplied gets its Node-backed default. */
export function createRewriter(deps: RewriterDependencies = {}): DocumentRewriter {
  const config = resolveConfig(deps.config, deps.cwd ?? process.cwd());
  const fs = deps.fs ?? new NodeFileSystem();
  const clock = deps.clock ?? new SystemClock();
  const logger = deps.logger ?? new ConsoleLogger(config.logLevel);
  const writer = new AtomicFileWriter(fs, clock, logger);
  return new DocumentRewriter(fs, config, logger, writer);
}
