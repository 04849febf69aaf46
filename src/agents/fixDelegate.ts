import type { FixAttempt, FixRequest, InvocationResult, KnowledgeExcerpt, RelevantFileSet } from "../types";

export interface FixAgentLike {
  invoke(request: FixRequest): Promise<InvocationResult>;
}

export interface FixDelegateInput {
  errorText: string;
  relevant: RelevantFileSet;
  excerpt?: KnowledgeExcerpt;
  readOnlyFiles?: string[];
}

export interface FixDelegateLike {
  delegate(input: FixDelegateInput): Promise<FixAttempt>;
}

export const buildFixMessage = (targetSubdir: string, errorText: string, excerpt?: KnowledgeExcerpt): string => {
  const sections = [`Fix this build or test error within ${targetSubdir}:`, errorText];

  if (excerpt) {
    sections.push(`Use this trimmed knowledge from the project's knowledge repository to inform the fix:\n${excerpt.text}`);
  }

  sections.push(
    "Modify the provided files (build descriptor and sources) to resolve the issue. " +
      "The repository map may also help identify dependencies or related code within the subdirectory."
  );
  return sections.join("\n\n");
};

export class FixDelegate implements FixDelegateLike {
  constructor(
    private readonly agent: FixAgentLike,
    private readonly targetSubdir: string
  ) {}

  async delegate(input: FixDelegateInput): Promise<FixAttempt> {
    if (input.relevant.files.length === 0) {
      return {
        status: "nothing_to_target",
        rawOutput: "No files to fix. The fixing agent was not invoked."
      };
    }

    const request: FixRequest = {
      message: buildFixMessage(this.targetSubdir, input.errorText, input.excerpt),
      files: input.relevant.files,
      readOnlyFiles: input.readOnlyFiles ?? []
    };

    try {
      const result = await this.agent.invoke(request);
      return {
        status: result.completed ? "completed" : "agent_failed",
        rawOutput: result.rawOutput
      };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        status: "agent_failed",
        rawOutput: `Fixing agent could not be invoked: ${message}`
      };
    }
  }
}
