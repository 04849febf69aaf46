export type RunRole = "loop" | "build" | "extractor" | "resolver" | "trimmer" | "fixer";

export type RunStatus = "pending" | "running" | "success" | "no_signal" | "exhausted" | "failed";

export interface ProjectFileSet {
  root: string;
  descriptor?: string;
  files: string[];
  warnings: string[];
}

export interface BuildOutcome {
  compileSucceeded: boolean;
  testSucceeded: boolean;
  log: string;
}

export interface ErrorReport {
  signature: string;
  lines: string[];
  lineNumber: number;
}

export interface ErrorBatch {
  reports: ErrorReport[];
  truncated: boolean;
  text: string;
  markerLineCount: number;
}

export type ExtractionResult = { kind: "errors"; batch: ErrorBatch } | { kind: "no_errors" };

export interface ParseFailure {
  file: string;
  message: string;
}

export interface RelevantFileSet {
  files: string[];
  descriptor?: string;
  directMatches: string[];
  confirmed: string[];
  structuralAdditions: string[];
  parseFailures: ParseFailure[];
  degenerate: boolean;
}

export interface KnowledgeDocument {
  source: string;
  content: string;
}

export interface ScoredBlock {
  source: string;
  score: number;
  text: string;
}

export interface KnowledgeExcerpt {
  blocks: ScoredBlock[];
  text: string;
  truncated: boolean;
  lineCount: number;
}

export interface FixRequest {
  message: string;
  files: string[];
  readOnlyFiles: string[];
}

export interface InvocationResult {
  completed: boolean;
  rawOutput: string;
}

export type FixAttemptStatus = "completed" | "agent_failed" | "nothing_to_target";

export interface FixAttempt {
  status: FixAttemptStatus;
  rawOutput: string;
}

export interface FileChange {
  path: string;
  content: string;
}

export interface RunInput {
  projectRoot: string;
  targetSubdir: string;
  maxIterations: number;
  knowledgeEnabled: boolean;
}

export interface RunState {
  id: string;
  status: RunStatus;
  input: RunInput;
  iteration: number;
  startedAt: string;
  endedAt?: string;
  finalSummary?: string;
}

export interface RunEvent {
  id: string;
  runId: string;
  timestamp: string;
  role: RunRole;
  type: string;
  message: string;
  iteration?: number;
  data?: Record<string, unknown>;
}
