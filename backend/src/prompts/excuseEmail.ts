import { ExcuseRequest, SeriousnessLevel } from "../types/excuse";

const toneDescriptions: Record<string, string> = {
  Sincere: "professional and apologetic",
  Playful: "light-hearted and humorous",
  Corporate: "formal and business-appropriate",
};

const defaultToneDescription = "professional";

const seriousnessDescriptions: Record<SeriousnessLevel, string> = {
  1: "very casual and silly",
  2: "casual and light",
  3: "balanced and moderate",
  4: "serious and professional",
  5: "very serious and formal",
};

export function describeTone(tone: string): string {
  return Object.prototype.hasOwnProperty.call(toneDescriptions, tone)
    ? toneDescriptions[tone]
    : defaultToneDescription;
}

export function describeSeriousness(seriousness: SeriousnessLevel): string {
  return seriousnessDescriptions[seriousness];
}

export function buildExcusePrompt(request: ExcuseRequest): string {
  const tone = describeTone(request.tone);
  const seriousness = describeSeriousness(request.seriousness);
  const bodyTemplate = `Dear ${request.recipient_name},\\n\\n[Your email body here]\\n\\nBest regards,\\n${request.sender_name}`;

  return [
    "You are an expert at writing excuse emails. Produce a JSON object with a subject line and an email body for this scenario:",
    "",
    `Category: ${request.category}`,
    `Tone: ${tone}`,
    `Seriousness: ${seriousness}`,
    `Recipient: ${request.recipient_name}`,
    `Sender: ${request.sender_name}`,
    `ETA/When: ${request.eta_when}`,
    "",
    "Requirements:",
    `- Write in a ${tone} tone.`,
    `- Keep it ${seriousness} in nature.`,
    "- Open with a greeting and close with a sign-off.",
    "- Be specific about the timing (ETA/When).",
    "- Stay professional while matching the requested tone.",
    "- Structure: greeting, apology/excuse, reason, next step, sign-off.",
    "",
    "Respond with ONLY a valid JSON object with exactly these two keys:",
    "{",
    '  "subject": "Your subject line here",',
    `  "body": "${bodyTemplate}"`,
    "}",
    "",
    "Output rules:",
    "- Return only the JSON object.",
    "- No explanations, reasoning, or surrounding text.",
    "- No markdown formatting.",
    "- No code blocks.",
  ].join("\n");
}
