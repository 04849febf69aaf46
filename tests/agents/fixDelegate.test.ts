import { describe, expect, it } from "vitest";
import { buildFixMessage, FixDelegate, type FixAgentLike } from "../../src/agents/fixDelegate";
import type { FixRequest, InvocationResult, KnowledgeExcerpt, RelevantFileSet } from "../../src/types";

class FakeAgent implements FixAgentLike {
  readonly requests: FixRequest[] = [];

  constructor(private readonly reply: InvocationResult | Error) {}

  async invoke(request: FixRequest): Promise<InvocationResult> {
    this.requests.push(request);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

const relevant = (files: string[]): RelevantFileSet => ({
  files,
  descriptor: files[0],
  directMatches: files.slice(1),
  confirmed: [],
  structuralAdditions: [],
  parseFailures: [],
  degenerate: files.length < 2
});

const excerpt: KnowledgeExcerpt = {
  blocks: [{ source: "maven.md", score: 1, text: "Pin junit in pom.xml" }],
  text: "Pin junit in pom.xml",
  truncated: false,
  lineCount: 1
};

describe("buildFixMessage", () => {
  it("names the subdirectory and carries the error text", () => {
    const message = buildFixMessage("src/main/java", "[ERROR] Foo.java:1: broken");

    expect(message.startsWith("Fix this build or test error within src/main/java:\n\n[ERROR] Foo.java:1: broken\n\n")).toBe(true);
    expect(message).not.toContain("knowledge repository");
  });

  it("includes the knowledge excerpt when present", () => {
    const message = buildFixMessage("src/main/java", "[ERROR] x", excerpt);
    expect(message).toContain("knowledge repository to inform the fix:\nPin junit in pom.xml");
  });
});

describe("FixDelegate", () => {
  it("refuses to invoke the agent without files", async () => {
    const agent = new FakeAgent({ completed: true, rawOutput: "" });

    const attempt = await new FixDelegate(agent, "src/main/java").delegate({ errorText: "[ERROR] x", relevant: relevant([]) });

    expect(attempt).toEqual({ status: "nothing_to_target", rawOutput: "No files to fix. The fixing agent was not invoked." });
    expect(agent.requests).toHaveLength(0);
  });

  it("passes the files and read-only knowledge files to the agent", async () => {
    const agent = new FakeAgent({ completed: true, rawOutput: "Applied edit to Foo.java" });

    const attempt = await new FixDelegate(agent, "src/main/java").delegate({
      errorText: "[ERROR] Foo.java:1: broken",
      relevant: relevant(["/repo/pom.xml", "/repo/src/main/java/Foo.java"]),
      excerpt,
      readOnlyFiles: ["/kb/maven.md"]
    });

    expect(attempt).toEqual({ status: "completed", rawOutput: "Applied edit to Foo.java" });
    expect(agent.requests[0].files).toEqual(["/repo/pom.xml", "/repo/src/main/java/Foo.java"]);
    expect(agent.requests[0].readOnlyFiles).toEqual(["/kb/maven.md"]);
    expect(agent.requests[0].message).toBe(buildFixMessage("src/main/java", "[ERROR] Foo.java:1: broken", excerpt));
  });

  it("reports an unsuccessful agent run", async () => {
    const agent = new FakeAgent({ completed: false, rawOutput: "model refused" });
    const attempt = await new FixDelegate(agent, "src").delegate({ errorText: "[ERROR] x", relevant: relevant(["/repo/pom.xml"]) });
    expect(attempt).toEqual({ status: "agent_failed", rawOutput: "model refused" });
  });

  it("turns an invocation error into a failed attempt", async () => {
    const agent = new FakeAgent(new Error("spawn aider ENOENT"));
    const attempt = await new FixDelegate(agent, "src").delegate({ errorText: "[ERROR] x", relevant: relevant(["/repo/pom.xml"]) });
    expect(attempt).toEqual({ status: "agent_failed", rawOutput: "Fixing agent could not be invoked: spawn aider ENOENT" });
  });
});
