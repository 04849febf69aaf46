#!/usr/bin/env node
import path from "node:path";
import { AiderFixAgent } from "./agents/aiderFixAgent";
import { FixDelegate, type FixAgentLike } from "./agents/fixDelegate";
import { OpenAiFixAgent } from "./agents/openAiFixAgent";
import { assertConfig, config, type RepairConfig } from "./config";
import { OpenAiClient } from "./llm/openaiClient";
import { RepairLoop } from "./orchestrator/repairLoop";
import { ArtifactStore } from "./services/artifactStore";
import { CommandRunner } from "./services/commandRunner";
import { ContextTrimmer } from "./services/contextTrimmer";
import { ErrorExtractor } from "./services/errorExtractor";
import { JavaStructureParser } from "./services/javaStructureParser";
import { LogCapture } from "./services/logCapture";
import { listFilesByExtension, loadKnowledgeDocuments, ProjectFiles } from "./services/projectFiles";
import { RelevanceResolver } from "./services/relevanceResolver";
import { RunStore } from "./services/runStore";
import { WorkspaceService } from "./services/workspace";
import type { RunEvent } from "./types";

const createAgent = (current: RepairConfig, runner: CommandRunner): FixAgentLike => {
  if (current.fixAgent === "openai") {
    const llm = new OpenAiClient({ apiKey: current.openaiApiKey, baseUrl: current.openaiBaseUrl, model: current.model });
    return new OpenAiFixAgent(llm, new WorkspaceService(current.projectRoot));
  }
  return new AiderFixAgent(runner, { command: current.aiderCommand, extraArgs: current.aiderArgs });
};

const printEvent = (event: RunEvent): void => {
  const iterationText = typeof event.iteration === "number" ? ` [#${event.iteration}]` : "";
  console.log(`[${event.timestamp}] [${event.role}]${iterationText} ${event.type}: ${event.message}`);
  const summary: unknown = event.data?.summary;
  if (typeof summary === "string" && summary) {
    console.log(summary);
  }
  const files: unknown = event.data?.files;
  if (event.type === "files_resolved" && Array.isArray(files)) {
    for (const file of files.map((item: unknown) => String(item))) {
      console.log(`  - ${file}`);
    }
  }
};

const main = async (): Promise<void> => {
  assertConfig();

  const runner = new CommandRunner(config.projectRoot);
  const artifacts = new ArtifactStore(config.logFile, config.errorLogFile);
  const projectFiles = new ProjectFiles(config);
  const knowledgeDir = config.knowledgeDir;
  const store = new RunStore();

  const loop = new RepairLoop(
    {
      store,
      projectFiles,
      logCapture: new LogCapture(runner, artifacts, config),
      extractor: new ErrorExtractor(artifacts, config),
      resolver: new RelevanceResolver(
        { sourceExtension: config.sourceExtension, sourceRoot: projectFiles.sourceRoot() },
        config.structuralAnalysis ? new JavaStructureParser() : undefined
      ),
      fixDelegate: new FixDelegate(createAgent(config, runner), config.targetSubdir),
      artifacts,
      trimmer: knowledgeDir
        ? new ContextTrimmer(() => loadKnowledgeDocuments(knowledgeDir), {
            descriptorName: path.basename(config.buildDescriptor),
            sourceExtension: config.sourceExtension,
            maxLines: config.maxKnowledgeLines
          })
        : undefined,
      readOnlyFiles: knowledgeDir ? () => listFilesByExtension(knowledgeDir, ".md") : undefined
    },
    {
      maxIterations: config.maxIterations,
      targetSubdir: config.targetSubdir,
      iterationDelayMs: config.iterationDelayMs,
      rescanEachIteration: config.rescanEachIteration,
      maxOutputChars: config.maxCommandOutputChars
    }
  );

  const unsubscribe = store.subscribeAll(printEvent);
  const result = await loop.run({ projectRoot: config.projectRoot, targetSubdir: config.targetSubdir }).finally(unsubscribe);

  const run = store.get(result.runId);
  console.log(`\nFinal status: ${result.state.kind}`);
  if (run?.finalSummary) {
    console.log(run.finalSummary);
  }
  if (result.state.kind !== "success") {
    console.log(`Build log: ${result.artifacts.log}`);
    console.log(`Error log: ${result.artifacts.errors}`);
    process.exitCode = 1;
  }
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exit(1);
});
