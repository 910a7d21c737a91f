import { isRecord } from "../utils/isRecord";

/**
 * Provider envelopes the serving endpoint is known to wrap generated text in.
 *
 *   chat_completion: { choices: [{ message: { content } }] }
 *   prediction:      { predictions: [{ candidates: [{ content }] }] }
 *   direct:          { content }
 *   opaque:          anything else, probed as text
 */
export type LlmEnvelope =
  | { kind: "chat_completion"; content: unknown }
  | { kind: "prediction"; content: unknown }
  | { kind: "direct"; content: unknown }
  | { kind: "opaque"; content: string };

function firstRecord(value: unknown): Record<string, unknown> | null {
  if (!Array.isArray(value) || value.length === 0) {
    return null;
  }

  return isRecord(value[0]) ? value[0] : null;
}

function isNonEmptyArray(value: unknown): boolean {
  return Array.isArray(value) && value.length > 0;
}

function stringifyOpaque(raw: unknown): string {
  if (typeof raw === "string") {
    return raw;
  }

  try {
    return JSON.stringify(raw) ?? String(raw);
  } catch (_error) {
    // Circular values.
    return String(raw);
  }
}

export function classifyEnvelope(raw: unknown): LlmEnvelope {
  if (isRecord(raw)) {
    if (isNonEmptyArray(raw.choices)) {
      const message = firstRecord(raw.choices)?.message;
      return {
        kind: "chat_completion",
        content: isRecord(message) ? message.content : undefined,
      };
    }

    if (isNonEmptyArray(raw.predictions)) {
      const candidate = firstRecord(firstRecord(raw.predictions)?.candidates);
      return { kind: "prediction", content: candidate?.content };
    }

    if ("content" in raw) {
      return { kind: "direct", content: raw.content };
    }
  }

  return { kind: "opaque", content: stringifyOpaque(raw) };
}

// Text parts contribute their text verbatim so JSON inside them stays unescaped.
function stringifyPart(part: unknown): string {
  if (isRecord(part) && typeof part.text === "string") {
    return part.text;
  }

  return stringifyOpaque(part);
}

/**
 * Flatten envelope content into one string. Content arrays (reasoning and
 * text parts) are joined with single spaces. Returns null when there is
 * nothing to probe, including falsy scalars such as 0 or false.
 */
export function extractEnvelopeContent(envelope: LlmEnvelope): string | null {
  const { content } = envelope;

  if (!content) {
    return null;
  }

  const text = Array.isArray(content)
    ? content.map(stringifyPart).join(" ")
    : stringifyPart(content);

  return text.length > 0 ? text : null;
}
