#!/usr/bin/env node
import { createRewriter, RewriterDependencies } from "./createRewriter";
import { RewriteError } from "./includes/types";

export interface ParsedArgs {
  documentPath?: string;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  return { documentPath: args.find((arg) => arg.length > 0) };
}

function describeFailure(error: RewriteError): string {
  switch (error.kind) {
    case "MissingInput":
      return `Cannot read document ${error.path}: ${error.message}`;
    case "MissingReference":
      return `Cannot read included file ${error.path}: ${error.message}`;
    case "WriteFailure":
      return `Cannot write document ${error.path}: ${error.message}`;
  }
}

/** Returns the process exit status. */
export async function runCli(argv: string[], deps: RewriterDependencies = {}): Promise<number> {
  const { documentPath } = parseArgs(argv);
  if (!documentPath) {
    console.error("Usage: md-includes <document>");
    return 1;
  }

  const rewriter = createRewriter(deps);
  const result = await rewriter.rewriteFile(documentPath);
  if (!result.success) {
    console.error(describeFailure(result.error));
    return 1;
  }
  return 0;
}

// Skip main() in test runners (Jest sets JEST_WORKER_ID)
if (!process.env.JEST_WORKER_ID) {
  runCli(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error("Fatal:", err);
      process.exit(1);
    });
}
