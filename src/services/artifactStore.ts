import fs from "node:fs/promises";
import path from "node:path";

export interface ArtifactLocations {
  log: string;
  errors: string;
}

export interface ArtifactStoreLike {
  writeLog(text: string): Promise<void>;
  readLog(): Promise<string | undefined>;
  writeErrors(text: string): Promise<void>;
  clear(): Promise<void>;
  locations(): ArtifactLocations;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * The two durable artifacts of a run: the captured build log and the trimmed error batch.
 * Each write replaces the file wholesale.
 */
export class ArtifactStore implements ArtifactStoreLike {
  constructor(
    private readonly logPath: string,
    private readonly errorPath: string
  ) {}

  locations(): ArtifactLocations {
    return { log: this.logPath, errors: this.errorPath };
  }

  async writeLog(text: string): Promise<void> {
    await this.write(this.logPath, text);
  }

  async readLog(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.logPath, "utf8");
    } catch (error: unknown) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }

  async writeErrors(text: string): Promise<void> {
    await this.write(this.errorPath, text);
  }

  async clear(): Promise<void> {
    await fs.rm(this.logPath, { force: true });
    await fs.rm(this.errorPath, { force: true });
  }

  private async write(filePath: string, text: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, text, "utf8");
  }
}
