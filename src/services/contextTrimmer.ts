import path from "node:path";
import type { KnowledgeDocument, KnowledgeExcerpt, ScoredBlock } from "../types";

export const KNOWLEDGE_TRUNCATION_NOTE = "[Note: Knowledge excerpt trimmed to the most relevant blocks.]";
export const NO_KNOWLEDGE = "No relevant knowledge found.";

export interface ContextTrimmerLike {
  trim(errorText: string): Promise<KnowledgeExcerpt>;
}

export interface ContextTrimmerOptions {
  descriptorName: string;
  sourceExtension: string;
  maxLines: number;
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const extractErrorKeywords = (errorText: string, descriptorName: string, sourceExtension = ".java"): string[] => {
  const keywords = new Set<string>();

  for (const match of errorText.matchAll(/package (\S+) does not exist/g)) {
    keywords.add(match[1]);
  }
  for (const match of errorText.matchAll(/symbol:\s+(?:class|interface|enum|record|variable|method|package)\s+([\w$.]+)/g)) {
    keywords.add(match[1]);
  }
  const sourcePattern = new RegExp(`([^\\s:\\[\\]]+${escapeRegExp(sourceExtension)})\\b`, "g");
  for (const match of errorText.matchAll(sourcePattern)) {
    keywords.add(path.basename(match[1]));
  }
  keywords.add(descriptorName);

  return [...keywords];
};

/** Splits on markdown headings and blank lines; headings stay at the start of their block. */
export const splitIntoBlocks = (content: string): string[] =>
  content
    .replace(/\r\n/g, "\n")
    .split(/\n(?=#{1,6}\s)|\n[ \t]*\n/)
    .map((block) => block.trim())
    .filter(Boolean);

export const scoreBlock = (block: string, keywords: string[]): number => {
  const haystack = block.toLowerCase();
  return new Set(keywords.map((keyword) => keyword.toLowerCase()).filter((keyword) => keyword && haystack.includes(keyword))).size;
};

export const trimKnowledge = (documents: KnowledgeDocument[], keywords: string[], maxLines: number): KnowledgeExcerpt => {
  const scored: ScoredBlock[] = [];
  for (const document of documents) {
    for (const text of splitIntoBlocks(document.content)) {
      const score = scoreBlock(text, keywords);
      if (score > 0) scored.push({ source: document.source, score, text });
    }
  }

  // Array.prototype.sort is stable, so equal scores keep document/block order.
  const ordered = [...scored].sort((a, b) => b.score - a.score);

  const included: ScoredBlock[] = [];
  let lineCount = 0;
  let truncated = false;

  for (const block of ordered) {
    const blockLines = block.text.split("\n");
    const remaining = maxLines - lineCount;
    if (blockLines.length <= remaining) {
      included.push(block);
      lineCount += blockLines.length;
      continue;
    }

    truncated = true;
    if (remaining > 0) {
      included.push({ ...block, text: blockLines.slice(0, remaining).join("\n") });
      lineCount += remaining;
    }
    break;
  }

  if (included.length === 0) {
    return { blocks: [], text: NO_KNOWLEDGE, truncated, lineCount: 0 };
  }

  const body = included.map((block) => block.text).join("\n\n");
  return {
    blocks: included,
    text: truncated ? `${body}\n${KNOWLEDGE_TRUNCATION_NOTE}` : body,
    truncated,
    lineCount
  };
};

export class ContextTrimmer implements ContextTrimmerLike {
  constructor(
    private readonly loadDocuments: () => Promise<KnowledgeDocument[]>,
    private readonly options: ContextTrimmerOptions
  ) {}

  async trim(errorText: string): Promise<KnowledgeExcerpt> {
    const keywords = extractErrorKeywords(errorText, this.options.descriptorName, this.options.sourceExtension);
    const documents = await this.loadDocuments();
    return trimKnowledge(documents, keywords, this.options.maxLines);
  }
}
