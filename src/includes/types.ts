export enum ScanState {
  OUTSIDE = "OUTSIDE",
  INSIDE_INCLUDE = "INSIDE_INCLUDE",
  INSIDE_CODE_BLOCK = "INSIDE_CODE_BLOCK",
}

export const CLOSING_FENCE = "```";

export function markerTag(language: string): string {
  return `INCLUDE-${language.toUpperCase()}`;
}

export function openingFence(language: string): string {
  return `${CLOSING_FENCE}${language}`;
}

export type RewriteErrorKind = "MissingInput" | "MissingReference" | "WriteFailure";

export interface RewriteError {
  kind: RewriteErrorKind;
  /** The file that could not be read or written. */
  path: string;
  message: string;
}

export interface IncludeRecord {
  /** Path as written in the marker. */
  path: string;
  resolvedPath: string;
  /** 1-based line of the marker in the source document. */
  line: number;
  /** False when no opening fence followed the marker before end of document. */
  injected: boolean;
}

export type RenderResult =
  | { success: true; content: string; includes: IncludeRecord[]; warnings: string[] }
  | { success: false; error: RewriteError };

export type RewriteResult =
  | {
      success: true;
      documentPath: string;
      changed: boolean;
      includes: IncludeRecord[];
      warnings: string[];
    }
  | { success: false; error: RewriteError };

export interface RewriteOptions {
  /** Render and compare only; never write the document. */
  dryRun?: boolean;
}
