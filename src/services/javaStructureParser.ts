import { parse } from "java-parser";

export interface CallSite {
  member: string;
  qualifier?: string;
}

export interface SourceStructure {
  imports: string[];
  typeNames: string[];
  callSites: CallSite[];
}

export interface StructureParserLike {
  /** Throws when the source does not parse. */
  parse(source: string): SourceStructure;
}

interface CstNodeLike {
  name: string;
  children: Record<string, unknown[]>;
}

interface TokenLike {
  image: string;
  startOffset: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const isCstNode = (value: unknown): value is CstNodeLike =>
  isRecord(value) && typeof value.name === "string" && isRecord(value.children);

const isToken = (value: unknown): value is TokenLike =>
  isRecord(value) && typeof value.image === "string" && typeof value.startOffset === "number";

const childNodes = (node: CstNodeLike): CstNodeLike[] => Object.values(node.children).flat().filter(isCstNode);

const childTokens = (node: CstNodeLike, tokenName: string): TokenLike[] => (node.children[tokenName] ?? []).filter(isToken);

const firstChild = (node: CstNodeLike, ruleName: string): CstNodeLike | undefined =>
  (node.children[ruleName] ?? []).find(isCstNode);

const declarationRules = new Set([
  "normalClassDeclaration",
  "enumDeclaration",
  "recordDeclaration",
  "normalInterfaceDeclaration",
  "annotationInterfaceDeclaration",
  "annotationTypeDeclaration"
]);

// Subtrees whose identifiers are not part of a call chain (generic arguments, call arguments).
const chainBoundaryRules = new Set(["typeArguments", "methodInvocationSuffix", "argumentList", "annotation"]);

const collectIdentifiers = (node: CstNodeLike): TokenLike[] => {
  const tokens: TokenLike[] = [...childTokens(node, "Identifier")];
  for (const child of childNodes(node)) {
    if (chainBoundaryRules.has(child.name)) continue;
    tokens.push(...collectIdentifiers(child));
  }
  return tokens.sort((a, b) => a.startOffset - b.startOffset);
};

const readImport = (node: CstNodeLike): string | undefined => {
  const name = firstChild(node, "packageOrTypeName");
  if (!name) return undefined;
  const segments = collectIdentifiers(name).map((token) => token.image);
  if (segments.length === 0) return undefined;
  const wildcard = childTokens(node, "Star").length > 0;
  return wildcard ? `${segments.join(".")}.*` : segments.join(".");
};

const readDeclaredType = (node: CstNodeLike): string | undefined => {
  const typeIdentifier = firstChild(node, "typeIdentifier");
  return typeIdentifier ? childTokens(typeIdentifier, "Identifier")[0]?.image : undefined;
};

/**
 * Reads a `primary` expression (`a.b.c(x).d()`) left to right: every method invocation
 * suffix closes a call whose member is the last identifier seen and whose qualifier is the rest.
 */
const readCallSites = (node: CstNodeLike): CallSite[] => {
  const sites: CallSite[] = [];
  const chain: string[] = [];

  const prefix = firstChild(node, "primaryPrefix");
  const reference = prefix ? firstChild(prefix, "fqnOrRefType") : undefined;
  if (reference) {
    chain.push(...collectIdentifiers(reference).map((token) => token.image));
  }

  for (const suffix of (node.children.primarySuffix ?? []).filter(isCstNode)) {
    const identifier = childTokens(suffix, "Identifier")[0];
    if (identifier) {
      chain.push(identifier.image);
      continue;
    }
    if (firstChild(suffix, "methodInvocationSuffix") && chain.length > 0) {
      const member = chain[chain.length - 1];
      const qualifier = chain.slice(0, -1).join(".");
      sites.push(qualifier ? { member, qualifier } : { member });
    }
  }

  return sites;
};

export class JavaStructureParser implements StructureParserLike {
  parse(source: string): SourceStructure {
    const tree: unknown = parse(source);
    if (!isCstNode(tree)) {
      throw new Error("Java parser returned an unexpected syntax tree.");
    }

    const structure: SourceStructure = { imports: [], typeNames: [], callSites: [] };
    const pending: CstNodeLike[] = [tree];

    while (pending.length > 0) {
      const node = pending.pop();
      if (!node) break;

      if (node.name === "importDeclaration") {
        const imported = readImport(node);
        if (imported) structure.imports.push(imported);
      } else if (declarationRules.has(node.name)) {
        const typeName = readDeclaredType(node);
        if (typeName) structure.typeNames.push(typeName);
      } else if (node.name === "primary") {
        structure.callSites.push(...readCallSites(node));
      }

      pending.push(...childNodes(node));
    }

    return structure;
  }
}
