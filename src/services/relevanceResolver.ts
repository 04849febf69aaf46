import fs from "node:fs/promises";
import path from "node:path";
import type { ParseFailure, ProjectFileSet, RelevantFileSet } from "../types";
import type { SourceStructure, StructureParserLike } from "./javaStructureParser";

export interface RelevanceOptions {
  sourceExtension: string;
  /** Absolute source root; imports are mapped beneath it. */
  sourceRoot: string;
}

export interface RelevanceResolverLike {
  resolve(errorText: string, fileSet: ProjectFileSet): Promise<RelevantFileSet>;
}

export type SourceReader = (absolutePath: string) => Promise<string>;

const readUtf8: SourceReader = (absolutePath) => fs.readFile(absolutePath, "utf8");

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Every `<path><ext>:<line>:` or `<path><ext>:[<line>,<col>]` reference, in first-mention order.
 */
export const extractPathReferences = (errorText: string, sourceExtension: string): string[] => {
  const pattern = new RegExp(`(\\S+?${escapeRegExp(sourceExtension)}):(?:\\d+:|\\[\\d+(?:,\\d+)?\\])`, "g");
  const found: string[] = [];
  for (const match of errorText.matchAll(pattern)) {
    const reference = match[1];
    if (!found.includes(reference)) found.push(reference);
  }
  return found;
};

export const normalizeReference = (reference: string, projectRoot: string): string =>
  path.isAbsolute(reference) ? path.normalize(reference) : path.resolve(projectRoot, reference);

const simpleName = (qualified: string): string => qualified.slice(qualified.lastIndexOf(".") + 1);

const corroborates = (structure: SourceStructure, errorText: string): boolean =>
  structure.imports.some((imported) => errorText.includes(imported)) ||
  structure.typeNames.some((typeName) => errorText.includes(typeName)) ||
  structure.callSites.some(
    (site) => errorText.includes(site.member) || (site.qualifier !== undefined && errorText.includes(site.qualifier))
  );

export class RelevanceResolver implements RelevanceResolverLike {
  constructor(
    private readonly options: RelevanceOptions,
    private readonly parser?: StructureParserLike,
    private readonly readSource: SourceReader = readUtf8
  ) {}

  async resolve(errorText: string, fileSet: ProjectFileSet): Promise<RelevantFileSet> {
    const inScope = new Set(fileSet.files);
    const directMatches = extractPathReferences(errorText, this.options.sourceExtension)
      .map((reference) => normalizeReference(reference, fileSet.root))
      .filter((candidate, index, all) => inScope.has(candidate) && candidate !== fileSet.descriptor && all.indexOf(candidate) === index);

    const confirmed: string[] = [];
    const structuralAdditions: string[] = [];
    const parseFailures: ParseFailure[] = [];

    if (this.parser) {
      for (const candidate of directMatches) {
        let structure: SourceStructure;
        try {
          structure = this.parser.parse(await this.readSource(candidate));
        } catch (error: unknown) {
          parseFailures.push({ file: candidate, message: error instanceof Error ? error.message : String(error) });
          continue;
        }

        if (corroborates(structure, errorText)) {
          confirmed.push(candidate);
        }

        for (const imported of this.importedProjectFiles(structure, errorText, inScope)) {
          if (!directMatches.includes(imported) && !structuralAdditions.includes(imported)) {
            structuralAdditions.push(imported);
          }
        }
      }
    }

    const files = [...(fileSet.descriptor ? [fileSet.descriptor] : []), ...directMatches, ...structuralAdditions];
    return {
      files,
      descriptor: fileSet.descriptor,
      directMatches,
      confirmed,
      structuralAdditions,
      parseFailures,
      degenerate: directMatches.length === 0
    };
  }

  private importedProjectFiles(structure: SourceStructure, errorText: string, inScope: ReadonlySet<string>): string[] {
    return structure.imports
      .filter((imported) => !imported.endsWith(".*") && errorText.includes(simpleName(imported)))
      .map((imported) => path.join(this.options.sourceRoot, ...imported.split(".")) + this.options.sourceExtension)
      .filter((candidate) => inScope.has(candidate));
  }
}
