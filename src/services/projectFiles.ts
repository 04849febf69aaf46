import fs from "node:fs/promises";
import path from "node:path";
import type { KnowledgeDocument, ProjectFileSet } from "../types";

export interface ProjectFilesOptions {
  projectRoot: string;
  buildDescriptor: string;
  targetSubdir: string;
  sourceExtension: string;
}

export interface ProjectFilesLike {
  collect(): Promise<ProjectFileSet>;
}

const ignoredDirs = new Set([".git", "node_modules", "target", "build", "dist", ".idea", ".gradle"]);

const exists = async (absolutePath: string): Promise<boolean> => {
  try {
    await fs.access(absolutePath);
    return true;
  } catch {
    return false;
  }
};

/** Lists files with the given extension under `root`, recursively, in sorted order. Missing roots yield []. */
export const listFilesByExtension = async (root: string, extension: string): Promise<string[]> => {
  const found: string[] = [];
  const wanted = extension.toLowerCase();

  const visit = async (currentAbsolute: string): Promise<void> => {
    const listing = await fs.readdir(currentAbsolute, { withFileTypes: true });
    for (const entry of listing) {
      const absolutePath = path.join(currentAbsolute, entry.name);

      if (entry.isDirectory()) {
        if (!ignoredDirs.has(entry.name)) {
          await visit(absolutePath);
        }
        continue;
      }

      if (entry.isFile() && path.extname(entry.name).toLowerCase() === wanted) {
        found.push(absolutePath);
      }
    }
  };

  if (!(await exists(root))) return [];
  await visit(root);
  return found.sort();
};

export class ProjectFiles implements ProjectFilesLike {
  constructor(private readonly options: ProjectFilesOptions) {}

  descriptorPath(): string {
    return path.resolve(this.options.projectRoot, this.options.buildDescriptor);
  }

  sourceRoot(): string {
    return path.resolve(this.options.projectRoot, this.options.targetSubdir);
  }

  async collect(): Promise<ProjectFileSet> {
    const warnings: string[] = [];
    const descriptorPath = this.descriptorPath();
    const descriptor = (await exists(descriptorPath)) ? descriptorPath : undefined;
    const sources = await listFilesByExtension(this.sourceRoot(), this.options.sourceExtension);

    if (sources.length === 0) {
      warnings.push(
        `No ${this.options.sourceExtension} files found in ${this.sourceRoot()}. ` +
          (descriptor ? `Including ${path.basename(descriptor)} only.` : "No build descriptor either.")
      );
    }

    const files = descriptor ? [descriptor, ...sources.filter((file) => file !== descriptor)] : sources;
    return {
      root: path.resolve(this.options.projectRoot),
      descriptor,
      files,
      warnings
    };
  }
}

export const loadKnowledgeDocuments = async (knowledgeDir: string): Promise<KnowledgeDocument[]> => {
  const files = await listFilesByExtension(knowledgeDir, ".md");
  return Promise.all(
    files.map(async (source) => ({
      source,
      content: await fs.readFile(source, "utf8")
    }))
  );
};
