import { describe, expect, it } from "vitest";
import { AiderFixAgent, buildAiderArgs } from "../../src/agents/aiderFixAgent";
import type { CommandResult, CommandRunnerLike, CommandRunOptions } from "../../src/services/commandRunner";

class RecordingRunner implements CommandRunnerLike {
  readonly calls: Array<{ command: string; options?: CommandRunOptions }> = [];

  constructor(private readonly result: CommandResult) {}

  async run(command: string, options?: CommandRunOptions): Promise<CommandResult> {
    this.calls.push({ command, options });
    return this.result;
  }
}

const request = {
  message: "Fix this build or test error",
  files: ["/repo/pom.xml", "/repo/src/main/java/Foo.java"],
  readOnlyFiles: ["/kb/maven.md"]
};

describe("buildAiderArgs", () => {
  it("places options before the message and the editable files last", () => {
    expect(buildAiderArgs(request, ["--yes-always"])).toEqual([
      "--yes-always",
      "--read",
      "/kb/maven.md",
      "--message",
      "Fix this build or test error",
      "/repo/pom.xml",
      "/repo/src/main/java/Foo.java"
    ]);
  });
});

describe("AiderFixAgent", () => {
  it("spawns the CLI directly and reports completion by exit code", async () => {
    const runner = new RecordingRunner({ exitCode: 0, output: "Applied edit" });

    const result = await new AiderFixAgent(runner, { command: "aider", extraArgs: [] }).invoke(request);

    expect(result).toEqual({ completed: true, rawOutput: "Applied edit" });
    expect(runner.calls[0].command).toBe("aider");
    expect(runner.calls[0].options?.args).toEqual(buildAiderArgs(request, []));
  });

  it("reports a non-zero exit as incomplete", async () => {
    const runner = new RecordingRunner({ exitCode: 2, output: "bad flag" });
    const result = await new AiderFixAgent(runner, { command: "aider", extraArgs: [] }).invoke(request);
    expect(result).toEqual({ completed: false, rawOutput: "bad flag" });
  });
});
