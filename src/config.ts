import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

export type FixAgentKind = "aider" | "openai";

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toBool = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return fallback;
  return ["1", "true", "yes", "on"].includes(normalized);
};

const toList = (value: string | undefined, fallback: string[]): string[] => {
  if (value === undefined) return fallback;
  return value.split(/\s+/g).map((item) => item.trim()).filter(Boolean);
};

const toAgentKind = (value: string | undefined): FixAgentKind => (value?.trim().toLowerCase() === "openai" ? "openai" : "aider");

export const readConfig = (env: NodeJS.ProcessEnv) => {
  const projectRoot = path.resolve(env.PROJECT_ROOT ?? process.cwd());
  const knowledgeDir = env.KNOWLEDGE_DIR?.trim();

  return {
    projectRoot,
    buildDescriptor: env.BUILD_DESCRIPTOR ?? "pom.xml",
    targetSubdir: env.TARGET_SUBDIR ?? "src/main/java",
    sourceExtension: env.SOURCE_EXTENSION ?? ".java",
    compileCommand: env.COMPILE_COMMAND ?? "mvn clean compile -f pom.xml",
    testCommand: env.TEST_COMMAND ?? "mvn test -f pom.xml",
    successMarker: env.SUCCESS_MARKER ?? "BUILD SUCCESS",
    requireSuccessMarker: toBool(env.REQUIRE_SUCCESS_MARKER, true),
    errorMarker: env.ERROR_MARKER ?? "[ERROR]",
    contextWindow: toInt(env.CONTEXT_WINDOW, 6),
    maxErrorLines: toInt(env.MAX_ERROR_LINES, 50),
    maxIterations: toInt(env.MAX_ITERATIONS, 10),
    iterationDelayMs: toInt(env.ITERATION_DELAY_MS, 1000),
    rescanEachIteration: toBool(env.RESCAN_EACH_ITERATION, false),
    logFile: path.resolve(projectRoot, env.LOG_FILE ?? "build_log.txt"),
    errorLogFile: path.resolve(projectRoot, env.ERROR_LOG_FILE ?? "error_log.txt"),
    knowledgeDir: knowledgeDir ? path.resolve(projectRoot, knowledgeDir) : undefined,
    maxKnowledgeLines: toInt(env.MAX_KNOWLEDGE_LINES, 100),
    structuralAnalysis: toBool(env.STRUCTURAL_ANALYSIS, true),
    fixAgent: toAgentKind(env.FIX_AGENT),
    aiderCommand: env.AIDER_COMMAND ?? "aider",
    aiderArgs: toList(env.AIDER_ARGS, ["--yes-always", "--no-auto-commits", "--map-tokens", "1024"]),
    openaiApiKey: env.OPENAI_API_KEY ?? "",
    openaiBaseUrl: env.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
    model: env.OPENAI_MODEL ?? "gpt-4.1-mini",
    maxCommandOutputChars: toInt(env.MAX_COMMAND_OUTPUT_CHARS, 12000)
  };
};

export type RepairConfig = ReturnType<typeof readConfig>;

export const config: RepairConfig = readConfig(process.env);

export const assertConfig = (current: RepairConfig = config): void => {
  if (current.contextWindow < 1) {
    throw new Error("CONTEXT_WINDOW must be at least 1.");
  }
  if (current.maxErrorLines < current.contextWindow) {
    throw new Error(`MAX_ERROR_LINES (${current.maxErrorLines}) must be at least CONTEXT_WINDOW (${current.contextWindow}).`);
  }
  if (current.maxIterations < 1) {
    throw new Error("MAX_ITERATIONS must be at least 1.");
  }
  if (current.maxKnowledgeLines < 1) {
    throw new Error("MAX_KNOWLEDGE_LINES must be at least 1.");
  }
  if (!current.errorMarker) {
    throw new Error("ERROR_MARKER must not be empty.");
  }
  if (current.fixAgent === "openai" && !current.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required when FIX_AGENT=openai. Add it to .env or shell env.");
  }
};
