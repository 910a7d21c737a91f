import {
  ExcuseDraft,
  GenerationResult,
  NormalizationStrategy,
} from "../types/excuse";
import { isRecord } from "../utils/isRecord";
import { unescapeBody } from "../utils/unescapeBody";
import { classifyEnvelope, extractEnvelopeContent } from "./llmEnvelope";

export const NO_CONTENT_DIAGNOSTIC = "no content found";

const diagnosticPreviewChars = 200;

type ExtractionStrategy = {
  name: NormalizationStrategy;
  extract: (content: string) => ExcuseDraft | null;
};

// `text` parts serialized inside the content, with either quote style on
// the key and the value.
const quotedTextFieldPatterns = [
  /'text':\s*'(\{.*?\})'/s,
  /"text":\s*"(\{.*?\})"/s,
  /'text':\s*"(\{.*?\})"/s,
  /"text":\s*'(\{.*?\})'/s,
];

const braceScanPatterns = [
  /\{[^{}]*"subject"[^{}]*"body"[^{}]*\}/gs,
  /\{.*?"subject".*?"body".*?\}/gs,
  /\{[^}]*"subject"[^}]*"body"[^}]*\}/gs,
];

const subjectValuePattern = /"subject":\s*"((?:[^"\\]|\\.)+)"/s;
const bodyValuePattern = /"body":\s*"((?:[^"\\]|\\.)+)"/s;

function toDraft(parsed: unknown): ExcuseDraft | null {
  if (!isRecord(parsed)) {
    return null;
  }

  const { subject, body } = parsed;
  if (typeof subject !== "string" || typeof body !== "string") {
    return null;
  }

  return { subject, body: unescapeBody(body) };
}

function parseDraft(candidate: string): ExcuseDraft | null {
  try {
    return toDraft(JSON.parse(candidate));
  } catch (_error) {
    return null;
  }
}

export function extractFromQuotedTextField(content: string): ExcuseDraft | null {
  for (const pattern of quotedTextFieldPatterns) {
    const match = content.match(pattern);
    if (!match) {
      continue;
    }

    const draft = parseDraft(unescapeBody(match[1]));
    if (draft) {
      return draft;
    }
  }

  return null;
}

export function extractFromBraceScan(content: string): ExcuseDraft | null {
  for (const pattern of braceScanPatterns) {
    for (const match of content.matchAll(pattern)) {
      const draft = parseDraft(match[0]);
      if (draft) {
        return draft;
      }
    }
  }

  return null;
}

export function extractFromWholeContent(content: string): ExcuseDraft | null {
  return parseDraft(content.trim());
}

export function extractFromKeyValues(content: string): ExcuseDraft | null {
  const subjectMatch = content.match(subjectValuePattern);
  const bodyMatch = content.match(bodyValuePattern);

  if (!subjectMatch || !bodyMatch) {
    return null;
  }

  return {
    subject: subjectMatch[1],
    body: unescapeBody(bodyMatch[1]),
  };
}

export const extractionStrategies: readonly ExtractionStrategy[] = [
  { name: "quoted_text_field", extract: extractFromQuotedTextField },
  { name: "brace_scan", extract: extractFromBraceScan },
  { name: "whole_content", extract: extractFromWholeContent },
  { name: "key_value", extract: extractFromKeyValues },
];

function runStrategy(
  strategy: ExtractionStrategy,
  content: string,
): ExcuseDraft | null {
  try {
    return strategy.extract(content);
  } catch (_error) {
    // A strategy that blows up simply did not match.
    return null;
  }
}

export function buildFailureDiagnostic(content: string): string {
  return `Could not extract email from LLM response. Content: ${Array.from(content).slice(0, diagnosticPreviewChars).join("")}...`;
}

/**
 * Recover a subject/body pair from whatever the serving endpoint returned.
 *
 * Never throws: every path ends in a GenerationResult.
 */
export function normalizeExcuseResponse(raw: unknown): GenerationResult {
  let content: string | null;

  try {
    content = extractEnvelopeContent(classifyEnvelope(raw));
  } catch (_error) {
    content = null;
  }

  if (!content) {
    return { kind: "failure", diagnostic: NO_CONTENT_DIAGNOSTIC };
  }

  for (const strategy of extractionStrategies) {
    const draft = runStrategy(strategy, content);
    if (draft) {
      return { kind: "success", strategy: strategy.name, ...draft };
    }
  }

  return { kind: "failure", diagnostic: buildFailureDiagnostic(content) };
}
