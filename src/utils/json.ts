const tryParseObject = (candidate: string): Record<string, unknown> | undefined => {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? Object.fromEntries(Object.entries(parsed)) : undefined;
  } catch {
    return undefined;
  }
};

/**
 * Reads a JSON object from model output: the whole reply, a ```json fence, or the
 * outermost brace pair, in that order.
 */
export const parseJsonObject = (text: string): Record<string, unknown> => {
  const trimmed = text.trim();
  const candidates = [trimmed];

  for (const match of trimmed.matchAll(/```(?:json)?\s*([\s\S]*?)```/gi)) {
    candidates.push(match[1].trim());
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start !== -1 && end > start) {
    candidates.push(trimmed.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    const parsed = tryParseObject(candidate);
    if (parsed) return parsed;
  }

  throw new Error("No JSON object found in model output.");
};
