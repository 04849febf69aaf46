import type { FixDelegateLike } from "../agents/fixDelegate";
import type { ArtifactLocations, ArtifactStoreLike } from "../services/artifactStore";
import type { ContextTrimmerLike } from "../services/contextTrimmer";
import type { ErrorExtractorLike } from "../services/errorExtractor";
import type { LogCaptureLike } from "../services/logCapture";
import type { ProjectFilesLike } from "../services/projectFiles";
import type { RelevanceResolverLike } from "../services/relevanceResolver";
import type { RunStore } from "../services/runStore";
import type { FixAttempt, KnowledgeExcerpt, ProjectFileSet, RunInput, RunStatus } from "../types";

export type RunningState = { kind: "running"; iteration: number };
export type TerminalState =
  | { kind: "success"; iteration: number }
  | { kind: "no_signal"; iteration: number }
  | { kind: "exhausted"; iteration: number };
export type LoopState = RunningState | TerminalState;

export type IterationSignal = "build_passed" | "no_errors" | "fix_attempted";

export const initialState = (): RunningState => ({ kind: "running", iteration: 1 });

export const transition = (state: RunningState, signal: IterationSignal, maxIterations: number): LoopState => {
  switch (signal) {
    case "build_passed":
      return { kind: "success", iteration: state.iteration };
    case "no_errors":
      return { kind: "no_signal", iteration: state.iteration };
    case "fix_attempted":
      return state.iteration >= maxIterations
        ? { kind: "exhausted", iteration: state.iteration }
        : { kind: "running", iteration: state.iteration + 1 };
  }
};

export const isTerminal = (state: LoopState): state is TerminalState => state.kind !== "running";

export interface RepairLoopDeps {
  store: RunStore;
  projectFiles: ProjectFilesLike;
  logCapture: LogCaptureLike;
  extractor: ErrorExtractorLike;
  resolver: RelevanceResolverLike;
  fixDelegate: FixDelegateLike;
  artifacts: ArtifactStoreLike;
  trimmer?: ContextTrimmerLike;
  /** Read-only context handed to the agent alongside the targets (knowledge documents). */
  readOnlyFiles?: () => Promise<string[]>;
}

export interface RepairLoopOptions {
  maxIterations: number;
  targetSubdir: string;
  iterationDelayMs?: number;
  rescanEachIteration?: boolean;
  /** Characters of agent output kept in events. */
  maxOutputChars?: number;
}

export interface RepairLoopResult {
  runId: string;
  state: TerminalState;
  iterations: number;
  fixAttempts: FixAttempt[];
  artifacts: ArtifactLocations;
}

const statusFor = (state: TerminalState): RunStatus => state.kind;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class RepairLoop {
  constructor(
    private readonly deps: RepairLoopDeps,
    private readonly options: RepairLoopOptions
  ) {}

  async run(input: Omit<RunInput, "maxIterations" | "knowledgeEnabled">): Promise<RepairLoopResult> {
    const { store } = this.deps;
    const run = store.create({
      ...input,
      maxIterations: this.options.maxIterations,
      knowledgeEnabled: this.deps.trimmer !== undefined
    });

    try {
      return await this.loop(run.id);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      store.pushEvent(run.id, "loop", "error", message);
      store.updateStatus(run.id, "failed", message);
      throw error;
    }
  }

  private async loop(runId: string): Promise<RepairLoopResult> {
    const { store } = this.deps;
    const fixAttempts: FixAttempt[] = [];

    store.updateStatus(runId, "running");
    store.pushEvent(runId, "loop", "run_started", `Repair loop started for ${this.options.targetSubdir}.`, {
      data: { maxIterations: this.options.maxIterations }
    });

    let fileSet = await this.collectFiles(runId);
    let state: LoopState = initialState();

    while (!isTerminal(state)) {
      const iteration = state.iteration;
      store.setIteration(runId, iteration);

      if (this.options.rescanEachIteration && iteration > 1) {
        fileSet = await this.collectFiles(runId, iteration);
      }

      state = transition(state, await this.runIteration(runId, iteration, fileSet, fixAttempts), this.options.maxIterations);

      if (!isTerminal(state) && this.options.iterationDelayMs) {
        await sleep(this.options.iterationDelayMs);
      }
    }

    return this.finish(runId, state, fixAttempts);
  }

  private async runIteration(
    runId: string,
    iteration: number,
    fileSet: ProjectFileSet,
    fixAttempts: FixAttempt[]
  ): Promise<IterationSignal> {
    const { store } = this.deps;

    store.pushEvent(runId, "build", "build_started", `Iteration ${iteration}: compiling and testing.`, { iteration });
    const outcome = await this.deps.logCapture.capture();
    store.pushEvent(
      runId,
      "build",
      outcome.compileSucceeded && outcome.testSucceeded ? "build_passed" : "build_failed",
      `Compile ${outcome.compileSucceeded ? "succeeded" : "failed"}, tests ${outcome.testSucceeded ? "succeeded" : outcome.compileSucceeded ? "failed" : "skipped"}.`,
      { iteration, data: { compileSucceeded: outcome.compileSucceeded, testSucceeded: outcome.testSucceeded } }
    );

    if (outcome.compileSucceeded && outcome.testSucceeded) {
      return "build_passed";
    }

    const extraction = await this.deps.extractor.extract();
    if (extraction.kind === "no_errors") {
      store.pushEvent(runId, "extractor", "no_errors", "No errors found, but build or tests failed.", { iteration });
      return "no_errors";
    }

    const { batch } = extraction;
    store.pushEvent(runId, "extractor", "errors_extracted", `Extracted ${batch.reports.length} unique error(s).`, {
      iteration,
      data: { summary: batch.text, truncated: batch.truncated, markerLineCount: batch.markerLineCount }
    });

    const relevant = await this.deps.resolver.resolve(batch.text, fileSet);
    for (const failure of relevant.parseFailures) {
      store.pushEvent(runId, "resolver", "parse_failed", `Failed to parse ${failure.file}: ${failure.message}`, { iteration });
    }
    if (relevant.degenerate) {
      store.pushEvent(
        runId,
        "resolver",
        "no_direct_matches",
        relevant.descriptor
          ? "No source file is referenced by the errors. Targeting the build descriptor only."
          : "No source file is referenced by the errors and no build descriptor exists.",
        { iteration }
      );
    }
    store.pushEvent(runId, "resolver", "files_resolved", `Targeting ${relevant.files.length} file(s).`, {
      iteration,
      data: {
        files: relevant.files,
        confirmed: relevant.confirmed,
        structuralAdditions: relevant.structuralAdditions
      }
    });

    const excerpt = await this.trimKnowledge(runId, iteration, batch.text);
    const readOnlyFiles = this.deps.readOnlyFiles ? await this.deps.readOnlyFiles() : [];

    store.pushEvent(runId, "fixer", "fix_started", `Iteration ${iteration}: running the fixing agent.`, { iteration });
    const attempt = await this.deps.fixDelegate.delegate({ errorText: batch.text, relevant, excerpt, readOnlyFiles });
    fixAttempts.push(attempt);

    const outputTail = attempt.rawOutput.slice(-(this.options.maxOutputChars ?? 2000));
    if (attempt.status === "completed") {
      store.pushEvent(runId, "fixer", "fix_completed", "Fixing agent completed.", { iteration, data: { summary: outputTail } });
    } else if (attempt.status === "nothing_to_target") {
      store.pushEvent(runId, "fixer", "nothing_to_target", "No files to fix. Continuing to next iteration.", { iteration });
    } else {
      store.pushEvent(runId, "fixer", "fix_failed", "Fixing agent failed to apply a fix. Continuing to next iteration.", {
        iteration,
        data: { summary: outputTail }
      });
    }

    return "fix_attempted";
  }

  private async trimKnowledge(runId: string, iteration: number, errorText: string): Promise<KnowledgeExcerpt | undefined> {
    if (!this.deps.trimmer) return undefined;

    const excerpt = await this.deps.trimmer.trim(errorText);
    this.deps.store.pushEvent(
      runId,
      "trimmer",
      "knowledge_trimmed",
      `Selected ${excerpt.blocks.length} knowledge block(s), ${excerpt.lineCount} line(s)${excerpt.truncated ? ", truncated" : ""}.`,
      { iteration }
    );
    return excerpt;
  }

  private async collectFiles(runId: string, iteration?: number): Promise<ProjectFileSet> {
    const fileSet = await this.deps.projectFiles.collect();
    for (const warning of fileSet.warnings) {
      this.deps.store.pushEvent(runId, "loop", "warning", warning, { iteration });
    }
    this.deps.store.pushEvent(runId, "loop", "files_collected", `${fileSet.files.length} file(s) in scope.`, {
      iteration,
      data: { files: fileSet.files }
    });
    return fileSet;
  }

  private async finish(runId: string, state: TerminalState, fixAttempts: FixAttempt[]): Promise<RepairLoopResult> {
    const { store, artifacts } = this.deps;
    const locations = artifacts.locations();
    let summary: string;

    if (state.kind === "success") {
      await artifacts.clear();
      summary = `Build and tests succeeded after ${state.iteration} iteration(s).`;
    } else if (state.kind === "no_signal") {
      summary = `No errors found, but build or tests failed. Check ${locations.log} and ${locations.errors} manually.`;
    } else {
      summary = `Maximum iterations (${this.options.maxIterations}) reached. Could not resolve all issues. Check ${locations.log} and ${locations.errors} for details.`;
    }

    store.updateStatus(runId, statusFor(state), summary);
    store.pushEvent(runId, "loop", "run_finished", summary, { iteration: state.iteration });

    return {
      runId,
      state,
      iterations: state.iteration,
      fixAttempts,
      artifacts: locations
    };
  }
}
