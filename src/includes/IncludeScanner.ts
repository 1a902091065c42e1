import { CLOSING_FENCE, markerTag, openingFence } from "./types";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Recognises include markers and fence lines for one fence language.
 * e.g., "<!-- INCLUDE-RUST: examples/demo.rs -->" → "examples/demo.rs"
 */
export class IncludeScanner {
  private readonly markerPrefix: string;
  private readonly markerPattern: RegExp;
  private readonly opening: string;

  constructor(language = "rust") {
    this.markerPrefix = `<!-- ${markerTag(language)}: `;
    // Greedy on both sides: the last marker on the line wins, and the path runs to the last " -->".
    this.markerPattern = new RegExp(`.*${escapeRegExp(this.markerPrefix)}(.*) -->`);
    this.opening = openingFence(language);
  }

  matchMarker(line: string): string | null {
    const match = this.markerPattern.exec(line);
    return match ? match[1] : null;
  }

  isMarkerCandidate(line: string): boolean {
    return line.includes(this.markerPrefix);
  }

  isOpeningFence(line: string): boolean {
    return line === this.opening;
  }

  isClosingFence(line: string): boolean {
    return line === CLOSING_FENCE;
  }
}
