/** Controls how much detail the rewriter reports.
 *  "info"  : one line per include marker and per rewritten document.
 *  "debug" : also state transitions and dropped block lines. */
export type LogLevel = "info" | "debug";

export interface ILogger {
  /** Always written. Use for progress the user should see: markers met, documents updated. */
  debug(message: string): void;
  /** Only written when logLevel is "debug". Use for scan internals. */
  verbose(message: string): void;
}

export class InMemoryLogger implements ILogger {
  private entries: string[] = [];
  private verboseEntries: string[] = [];

  debug(message: string): void {
    this.entries.push(message);
  }

  verbose(message: string): void {
    this.verboseEntries.push(message);
  }

  getEntries(): string[] {
    return [...this.entries];
  }

  getVerboseEntries(): string[] {
    return [...this.verboseEntries];
  }
}

export class ConsoleLogger implements ILogger {
  constructor(private readonly logLevel: LogLevel = "info") {}

  debug(message: string): void {
    console.log(message);
  }

  verbose(message: string): void {
    if (this.logLevel !== "debug") {
      return;
    }
    console.log(message);
  }
}
