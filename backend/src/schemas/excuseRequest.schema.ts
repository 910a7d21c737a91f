import { ExcuseRequest, SeriousnessLevel } from "../types/excuse";
import { isRecord } from "../utils/isRecord";

export class ExcuseValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExcuseValidationError";
  }
}

const requiredStringFields = [
  "category",
  "tone",
  "recipient_name",
  "sender_name",
  "eta_when",
] as const;

function isSeriousnessLevel(value: number): value is SeriousnessLevel {
  return Number.isInteger(value) && value >= 1 && value <= 5;
}

function readSeriousness(value: unknown): SeriousnessLevel {
  // Form posts sometimes carry the slider value as a string.
  const numeric =
    typeof value === "string" && /^\s*-?\d+\s*$/.test(value)
      ? Number(value)
      : value;

  if (typeof numeric !== "number" || !Number.isInteger(numeric)) {
    throw new ExcuseValidationError(
      "Missing or invalid 'seriousness' field. Expected an integer from 1 to 5.",
    );
  }

  if (!isSeriousnessLevel(numeric)) {
    throw new ExcuseValidationError(
      `'seriousness' must be between 1 and 5, received ${numeric}.`,
    );
  }

  return numeric;
}

/**
 * Validate an untrusted request body and freeze it into an ExcuseRequest.
 *
 * Throws ExcuseValidationError naming the first offending field.
 */
export function createExcuseRequest(input: unknown): ExcuseRequest {
  if (!isRecord(input)) {
    throw new ExcuseValidationError("Request body must be a JSON object.");
  }

  for (const field of requiredStringFields) {
    if (typeof input[field] !== "string") {
      throw new ExcuseValidationError(`Missing or invalid '${field}' field.`);
    }
  }

  return Object.freeze({
    category: String(input.category),
    tone: String(input.tone),
    seriousness: readSeriousness(input.seriousness),
    recipient_name: String(input.recipient_name),
    sender_name: String(input.sender_name),
    eta_when: String(input.eta_when),
  });
}
