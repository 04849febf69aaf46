import { z } from "zod";
import type { JsonLlmLike } from "../llm/openaiClient";
import type { WorkspaceLike } from "../services/workspace";
import type { FixRequest, InvocationResult } from "../types";
import { parseJsonObject } from "../utils/json";
import type { FixAgentLike } from "./fixDelegate";

const fixSchema = z.object({
  rationale: z.string().min(1),
  changes: z
    .array(
      z.object({
        path: z.string().min(1),
        content: z.string()
      })
    )
    .min(1)
});

const SYSTEM_PROMPT = [
  "You are the fixing agent in an automated build-repair loop.",
  "Return only a JSON object with keys: rationale, changes.",
  "changes must be an array of { path, content } where content is the complete new file content.",
  "Only change files listed under 'Editable files'. Reference files are read-only.",
  "Make the smallest change that resolves the reported errors.",
  "Do not return markdown."
].join(" ");

const renderBundle = (files: Record<string, string>): string =>
  Object.entries(files)
    .map(([filePath, content]) => `FILE: ${filePath}\n${content || "<EMPTY>"}`)
    .join("\n\n");

/**
 * Asks a chat model for whole-file replacements and writes them back. Changes to paths
 * outside the request's file list are discarded.
 */
export class OpenAiFixAgent implements FixAgentLike {
  constructor(
    private readonly llm: JsonLlmLike,
    private readonly workspace: WorkspaceLike
  ) {}

  async invoke(request: FixRequest): Promise<InvocationResult> {
    const editable = request.files.map((file) => this.workspace.toRelative(file));
    const reference = request.readOnlyFiles.map((file) => this.workspace.toRelative(file));
    const editableFiles = await this.workspace.readFiles(editable);
    const referenceFiles = reference.length > 0 ? await this.workspace.readFiles(reference) : {};

    const user = [
      request.message,
      `Editable files:\n${renderBundle(editableFiles)}`,
      ...(reference.length > 0 ? [`Reference files:\n${renderBundle(referenceFiles)}`] : [])
    ].join("\n\n");

    const raw = await this.llm.completeJsonObject(SYSTEM_PROMPT, user);

    let reply: z.infer<typeof fixSchema>;
    try {
      const parsed = fixSchema.safeParse(parseJsonObject(raw));
      if (!parsed.success) {
        return { completed: false, rawOutput: `Model reply did not match the fix schema: ${parsed.error.message}\n${raw}` };
      }
      reply = parsed.data;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return { completed: false, rawOutput: `${message}\n${raw}` };
    }

    const allowed = new Set(editable);
    const accepted = reply.changes.filter((change) => allowed.has(change.path));
    const rejected = reply.changes.filter((change) => !allowed.has(change.path)).map((change) => change.path);

    if (accepted.length === 0) {
      return { completed: false, rawOutput: `Model proposed no changes to the target files.\n${reply.rationale}` };
    }

    await this.workspace.applyChanges(accepted);

    const lines = [reply.rationale, `Applied ${accepted.length} file change(s): ${accepted.map((change) => change.path).join(", ")}`];
    if (rejected.length > 0) {
      lines.push(`Ignored out-of-scope change(s): ${rejected.join(", ")}`);
    }
    return { completed: true, rawOutput: lines.join("\n") };
  }
}
