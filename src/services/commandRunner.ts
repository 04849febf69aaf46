import { spawn } from "node:child_process";

export interface CommandResult {
  exitCode: number;
  output: string;
}

export interface CommandRunOptions {
  cwd?: string;
  /** When set, the command is spawned directly with these arguments instead of through a shell. */
  args?: string[];
}

export interface CommandRunnerLike {
  run(command: string, options?: CommandRunOptions): Promise<CommandResult>;
}

/**
 * Runs a process and collects stdout and stderr into one string, in arrival order.
 * Rejects only when the process cannot be spawned at all.
 */
export class CommandRunner implements CommandRunnerLike {
  constructor(private readonly root: string) {}

  async run(command: string, options?: CommandRunOptions): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const cwd = options?.cwd ?? this.root;
      const child = options?.args
        ? spawn(command, options.args, { cwd, env: process.env })
        : spawn(command, { cwd, shell: true, env: process.env });

      let combined = "";
      child.stdout.on("data", (chunk: Buffer) => {
        combined += chunk.toString("utf8");
      });
      child.stderr.on("data", (chunk: Buffer) => {
        combined += chunk.toString("utf8");
      });
      child.on("error", (err) => reject(err));
      child.on("close", (code) => {
        resolve({ exitCode: code ?? 1, output: combined });
      });
    });
  }
}
