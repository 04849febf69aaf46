import fs from "node:fs/promises";
import path from "node:path";
import type { FileChange } from "../types";

const isInside = (candidate: string, root: string): boolean => {
  const relative = path.relative(root, candidate);
  return relative.length > 0 && !relative.startsWith("..") && !path.isAbsolute(relative);
};

export interface WorkspaceLike {
  toRelative(absolutePath: string): string;
  readFiles(filePaths: string[]): Promise<Record<string, string>>;
  applyChanges(changes: FileChange[]): Promise<void>;
}

/** File access confined to the project root. Paths are project-relative with forward slashes. */
export class WorkspaceService implements WorkspaceLike {
  constructor(private readonly root: string) {}

  resolveSafePath(relativePath: string): string {
    const cleaned = relativePath.replace(/^\/+/, "");
    const absolute = path.resolve(this.root, cleaned);
    if (!isInside(absolute, this.root)) {
      throw new Error(`Unsafe path rejected: ${relativePath}`);
    }
    return absolute;
  }

  toRelative(absolutePath: string): string {
    return path.relative(this.root, absolutePath).split(path.sep).join("/");
  }

  async readFiles(filePaths: string[]): Promise<Record<string, string>> {
    const entries = await Promise.all(
      filePaths.map(async (filePath) => {
        const content = await fs.readFile(this.resolveSafePath(filePath), "utf8");
        return [filePath, content] as const;
      })
    );

    return Object.fromEntries(entries);
  }

  async applyChanges(changes: FileChange[]): Promise<void> {
    for (const change of changes) {
      const absolute = this.resolveSafePath(change.path);
      await fs.mkdir(path.dirname(absolute), { recursive: true });
      await fs.writeFile(absolute, change.content, "utf8");
    }
  }
}
