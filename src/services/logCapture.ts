import type { BuildOutcome } from "../types";
import type { ArtifactStoreLike } from "./artifactStore";
import type { CommandRunnerLike } from "./commandRunner";

export interface LogCaptureOptions {
  compileCommand: string;
  testCommand: string;
  errorMarker: string;
  successMarker: string;
  requireSuccessMarker: boolean;
}

export interface LogCaptureLike {
  capture(): Promise<BuildOutcome>;
}

interface StepResult {
  succeeded: boolean;
  output: string;
}

// POSIX shells report an unknown executable with this exit code.
const COMMAND_NOT_FOUND = 127;

export class LogCapture implements LogCaptureLike {
  constructor(
    private readonly runner: CommandRunnerLike,
    private readonly artifacts: ArtifactStoreLike,
    private readonly options: LogCaptureOptions
  ) {}

  async capture(): Promise<BuildOutcome> {
    const compile = await this.runStep(this.options.compileCommand);
    let log = compile.output;
    let testSucceeded = false;

    if (compile.succeeded) {
      const test = await this.runStep(this.options.testCommand);
      log = ensureTrailingNewline(log) + test.output;
      testSucceeded = test.succeeded;
    }

    await this.artifacts.writeLog(log);
    return {
      compileSucceeded: compile.succeeded,
      testSucceeded,
      log
    };
  }

  private async runStep(command: string): Promise<StepResult> {
    try {
      const result = await this.runner.run(command);
      if (result.exitCode === COMMAND_NOT_FOUND) {
        return { succeeded: false, output: ensureTrailingNewline(result.output) + this.invocationFailure(command, "command not found") };
      }

      const markerSatisfied = !this.options.requireSuccessMarker || result.output.includes(this.options.successMarker);
      return {
        succeeded: result.exitCode === 0 && markerSatisfied,
        output: result.output
      };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return { succeeded: false, output: this.invocationFailure(command, message) };
    }
  }

  private invocationFailure(command: string, reason: string): string {
    return `${this.options.errorMarker} Failed to invoke "${command}": ${reason}\n`;
  }
}

const ensureTrailingNewline = (text: string): string => (text === "" || text.endsWith("\n") ? text : `${text}\n`);
