import * as path from "node:path";
import { IFileSystem } from "./abstractions/IFileSystem";
import { AtomicFileWriter } from "./io/AtomicFileWriter";
import { IncludeScanner } from "./IncludeScanner";
import { normalizeLines } from "./normalize";
import {
  IncludeRecord,
  openingFence,
  RenderResult,
  RewriteError,
  RewriteErrorKind,
  RewriteOptions,
  RewriteResult,
  ScanState,
} from "./types";
import type { RewriterConfig } from "../config";
import type { ILogger } from "../logging";

interface SplitText {
  lines: string[];
  trailingNewline: boolean;
}

function splitLines(text: string): SplitText {
  if (text === "") {
    return { lines: [], trailingNewline: false };
  }
  const trailingNewline = text.endsWith("\n");
  const body = trailingNewline ? text.slice(0, -1) : text;
  return { lines: body.split("\n"), trailingNewline };
}

function joinLines({ lines, trailingNewline }: SplitText): string {
  if (lines.length === 0) {
    return "";
  }
  return lines.join("\n") + (trailingNewline ? "\n" : "");
}

/** Trailing newlines of a referenced file are not part of the sample; an empty file injects one empty line. */
function includeLines(content: string): string[] {
  return content.replace(/\n+$/, "").split("\n");
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function failure(kind: RewriteErrorKind, filePath: string, err: unknown): { success: false; error: RewriteError } {
  return { success: false, error: { kind, path: filePath, message: describeError(err) } };
}

interface PendingInclude {
  record: IncludeRecord;
  lines: string[];
}

export class DocumentRewriter {
  private readonly scanner: IncludeScanner;
  private readonly opening: string;

  constructor(
    private readonly fs: IFileSystem,
    private readonly config: RewriterConfig,
    private readonly logger: ILogger,
    private readonly writer: AtomicFileWriter
  ) {
    this.scanner = new IncludeScanner(config.language);
    this.opening = openingFence(config.language);
  }

  /**
   * Renders `source` with every include block refreshed from its referenced file.
   * Nothing is written; `documentLabel` only names the document in log lines.
   */
  async render(source: string, documentLabel = "<document>"): Promise<RenderResult> {
    const input = splitLines(source);
    const output: string[] = [];
    const includes: IncludeRecord[] = [];
    const warnings: string[] = [];
    const warn = (message: string): void => {
      warnings.push(message);
      this.logger.debug(`Warning: ${message}`);
    };

    let state = ScanState.OUTSIDE;
    let pending: PendingInclude | null = null;
    let dropped = 0;

    for (let i = 0; i < input.lines.length; i++) {
      const line = input.lines[i];
      const lineNumber = i + 1;

      if (state === ScanState.OUTSIDE) {
        const includePath = this.scanner.matchMarker(line);
        if (includePath !== null) {
          const resolvedPath = path.resolve(this.config.baseDir, includePath);
          this.logger.debug(`Processing '${documentLabel}' include block for: ${includePath}`);
          let content: string;
          try {
            content = await this.fs.readFile(resolvedPath);
          } catch (err) {
            return failure("MissingReference", resolvedPath, err);
          }
          const record: IncludeRecord = { path: includePath, resolvedPath, line: lineNumber, injected: false };
          includes.push(record);
          pending = { record, lines: includeLines(content) };
          output.push(line);
          state = this.transition(state, ScanState.INSIDE_INCLUDE, lineNumber);
          continue;
        }
        if (this.scanner.isMarkerCandidate(line)) {
          warn(`line ${lineNumber} looks like an include marker but has no closing " -->"`);
        }
        output.push(line);
        continue;
      }

      if (state === ScanState.INSIDE_INCLUDE && pending) {
        if (this.scanner.isOpeningFence(line)) {
          output.push(line, ...pending.lines);
          pending.record.injected = true;
          dropped = 0;
          state = this.transition(state, ScanState.INSIDE_CODE_BLOCK, lineNumber);
          continue;
        }
        if (this.scanner.matchMarker(line) !== null) {
          this.logger.verbose(
            `line ${lineNumber}: marker ignored, still waiting for the ${this.opening} block of ${pending.record.path}`
          );
        }
        output.push(line);
        continue;
      }

      if (this.scanner.isClosingFence(line)) {
        output.push(line);
        if (pending) {
          this.logger.verbose(`Replaced ${dropped} line(s) in the block for ${pending.record.path}`);
        }
        pending = null;
        state = this.transition(state, ScanState.OUTSIDE, lineNumber);
        continue;
      }

      dropped++;
    }

    if (pending && state === ScanState.INSIDE_INCLUDE) {
      warn(
        `include marker for ${pending.record.path} (line ${pending.record.line}) is not followed by a ${this.opening} block`
      );
    } else if (pending && state === ScanState.INSIDE_CODE_BLOCK) {
      warn(
        `code block for ${pending.record.path} (line ${pending.record.line}) is not closed before end of document`
      );
    }

    const content = joinLines({ lines: normalizeLines(output), trailingNewline: input.trailingNewline });
    return { success: true, content, includes, warnings };
  }

  async rewriteFile(document: string, options: RewriteOptions = {}): Promise<RewriteResult> {
    const documentPath = path.resolve(this.config.cwd, document);
    let source: string;
    try {
      source = await this.fs.readFile(documentPath);
    } catch (err) {
      return failure("MissingInput", documentPath, err);
    }

    const rendered = await this.render(source, documentPath);
    if (!rendered.success) {
      return rendered;
    }

    const changed = rendered.content !== source;
    if (changed && !options.dryRun) {
      try {
        await this.writer.write(documentPath, rendered.content);
      } catch (err) {
        return failure("WriteFailure", documentPath, err);
      }
      this.logger.debug(`Updated ${documentPath}`);
    }

    return {
      success: true,
      documentPath,
      changed,
      includes: rendered.includes,
      warnings: rendered.warnings,
    };
  }

  private transition(from: ScanState, to: ScanState, lineNumber: number): ScanState {
    this.logger.verbose(`line ${lineNumber}: ${from} -> ${to}`);
    return to;
  }
}
