import path from "node:path";
import { describe, expect, it } from "vitest";
import { assertConfig, readConfig } from "../src/config";

describe("readConfig", () => {
  it("applies the defaults", () => {
    const current = readConfig({ PROJECT_ROOT: "/repo" });

    expect(current.projectRoot).toBe(path.resolve("/repo"));
    expect(current.compileCommand).toBe("mvn clean compile -f pom.xml");
    expect(current.testCommand).toBe("mvn test -f pom.xml");
    expect(current.contextWindow).toBe(6);
    expect(current.maxErrorLines).toBe(50);
    expect(current.maxIterations).toBe(10);
    expect(current.maxKnowledgeLines).toBe(100);
    expect(current.logFile).toBe(path.resolve("/repo", "build_log.txt"));
    expect(current.errorLogFile).toBe(path.resolve("/repo", "error_log.txt"));
    expect(current.knowledgeDir).toBeUndefined();
    expect(current.fixAgent).toBe("aider");
    expect(current.aiderArgs).toEqual(["--yes-always", "--no-auto-commits", "--map-tokens", "1024"]);
  });

  it("reads overrides from the environment", () => {
    const current = readConfig({
      PROJECT_ROOT: "/repo",
      MAX_ITERATIONS: "3",
      REQUIRE_SUCCESS_MARKER: "false",
      KNOWLEDGE_DIR: "kb",
      FIX_AGENT: "OpenAI",
      AIDER_ARGS: "--yes-always  --model sonnet",
      MAX_ERROR_LINES: "not a number"
    });

    expect(current.maxIterations).toBe(3);
    expect(current.requireSuccessMarker).toBe(false);
    expect(current.knowledgeDir).toBe(path.resolve("/repo", "kb"));
    expect(current.fixAgent).toBe("openai");
    expect(current.aiderArgs).toEqual(["--yes-always", "--model", "sonnet"]);
    expect(current.maxErrorLines).toBe(50);
  });
});

describe("assertConfig", () => {
  const base = readConfig({ PROJECT_ROOT: "/repo" });

  it("accepts the defaults", () => {
    expect(() => assertConfig(base)).not.toThrow();
  });

  it("rejects a budget smaller than one window", () => {
    expect(() => assertConfig({ ...base, maxErrorLines: 4 })).toThrow("MAX_ERROR_LINES (4) must be at least CONTEXT_WINDOW (6).");
  });

  it("rejects a zero iteration cap", () => {
    expect(() => assertConfig({ ...base, maxIterations: 0 })).toThrow("MAX_ITERATIONS must be at least 1.");
  });

  it("requires an API key for the chat-model agent", () => {
    expect(() => assertConfig({ ...base, fixAgent: "openai", openaiApiKey: "" })).toThrow("OPENAI_API_KEY is required");
    expect(() => assertConfig({ ...base, fixAgent: "openai", openaiApiKey: "test-secret" })).not.toThrow();
  });
});
