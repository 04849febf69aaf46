import type { ErrorBatch, ErrorReport, ExtractionResult } from "../types";
import type { ArtifactStoreLike } from "./artifactStore";

export interface ExtractionOptions {
  errorMarker: string;
  contextWindow: number;
  maxErrorLines: number;
}

export interface ErrorExtractorLike {
  extract(): Promise<ExtractionResult>;
}

export const TRUNCATION_NOTE = "[Note: Error log truncated. Showing first unique errors only.]";

const LINE_PLACEHOLDER = "<line>";

const lineNumberPatterns: Array<[RegExp, string]> = [
  // javac / gcc style: Foo.java:42:
  [/:\d+:/g, `:${LINE_PLACEHOLDER}:`],
  // maven compiler plugin style: Foo.java:[42,13]
  [/:\[\d+,\d+\]/g, `:[${LINE_PLACEHOLDER},${LINE_PLACEHOLDER}]`],
  [/:\[\d+\]/g, `:[${LINE_PLACEHOLDER}]`]
];

export const computeSignature = (line: string): string =>
  lineNumberPatterns.reduce((current, [pattern, replacement]) => current.replace(pattern, replacement), line.trimEnd());

export const splitLogLines = (logText: string): string[] => {
  const lines = logText.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
};

export const renderBatchText = (reports: ErrorReport[], truncated: boolean): string => {
  const body = reports.map((report) => report.lines.join("\n")).join("\n");
  return truncated ? `${body}\n${TRUNCATION_NOTE}` : body;
};

/**
 * Builds the deduplicated error batch for one log. Returns undefined when no line carries the marker.
 * The cap is `floor(maxErrorLines / contextWindow)` reports, so the batch never exceeds the line budget.
 */
export const extractErrorBatch = (logText: string, options: ExtractionOptions): ErrorBatch | undefined => {
  const lines = splitLogLines(logText);
  const maxReports = Math.floor(options.maxErrorLines / options.contextWindow);
  const seen = new Set<string>();
  const reports: ErrorReport[] = [];
  let markerLineCount = 0;
  let truncated = false;

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];
    if (!line.includes(options.errorMarker)) continue;
    markerLineCount += 1;

    const signature = computeSignature(line);
    if (seen.has(signature)) continue;
    seen.add(signature);

    if (reports.length >= maxReports) {
      truncated = true;
      continue;
    }

    reports.push({
      signature,
      lines: lines.slice(index, index + options.contextWindow),
      lineNumber: index + 1
    });
  }

  if (markerLineCount === 0) return undefined;

  return {
    reports,
    truncated,
    text: renderBatchText(reports, truncated),
    markerLineCount
  };
};

export class ErrorExtractor implements ErrorExtractorLike {
  constructor(
    private readonly artifacts: ArtifactStoreLike,
    private readonly options: ExtractionOptions
  ) {}

  async extract(): Promise<ExtractionResult> {
    const logText = (await this.artifacts.readLog()) ?? "";
    const batch = extractErrorBatch(logText, this.options);

    await this.artifacts.writeErrors(batch ? `${batch.text}\n` : "");
    return batch ? { kind: "errors", batch } : { kind: "no_errors" };
  }
}
