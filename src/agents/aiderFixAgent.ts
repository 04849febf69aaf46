import type { FixRequest, InvocationResult } from "../types";
import type { CommandRunnerLike } from "../services/commandRunner";
import type { FixAgentLike } from "./fixDelegate";

export interface AiderFixAgentOptions {
  command: string;
  extraArgs: string[];
}

export const buildAiderArgs = (request: FixRequest, extraArgs: string[]): string[] => [
  ...extraArgs,
  ...request.readOnlyFiles.flatMap((file) => ["--read", file]),
  "--message",
  request.message,
  ...request.files
];

/** Hands the request to the aider CLI in one-shot mode. Spawn failures propagate to the caller. */
export class AiderFixAgent implements FixAgentLike {
  constructor(
    private readonly runner: CommandRunnerLike,
    private readonly options: AiderFixAgentOptions
  ) {}

  async invoke(request: FixRequest): Promise<InvocationResult> {
    const result = await this.runner.run(this.options.command, {
      args: buildAiderArgs(request, this.options.extraArgs)
    });
    return {
      completed: result.exitCode === 0,
      rawOutput: result.output
    };
  }
}
