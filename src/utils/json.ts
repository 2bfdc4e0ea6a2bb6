import { Result, err, ok } from "./result.js";

export function parseJsonFromModelText(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error("Model returned an empty response.");
  }

  const fenced = extractFencedJson(trimmed);
  const candidates = [
    fenced,
    trimmed,
    extractDelimitedJson(trimmed, "{", "}"),
    extractDelimitedJson(trimmed, "[", "]")
  ];

  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const parsed = tryParseJson(candidate);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  throw new Error("Model response did not contain valid JSON.");
}

function tryParseJson(text: string): Result<unknown, SyntaxError> {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return err(error instanceof SyntaxError ? error : new SyntaxError(String(error)));
  }
}

function extractFencedJson(text: string): string | null {
  const match = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return match?.[1]?.trim() ?? null;
}

function extractDelimitedJson(text: string, start: string, end: string): string | null {
  const startIndex = text.indexOf(start);
  const endIndex = text.lastIndexOf(end);

  if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
    return null;
  }

  return text.slice(startIndex, endIndex + 1).trim();
}
