export type SeriousnessLevel = 1 | 2 | 3 | 4 | 5;

export type ExcuseRequest = {
  readonly category: string;
  readonly tone: string;
  readonly seriousness: SeriousnessLevel;
  readonly recipient_name: string;
  readonly sender_name: string;
  readonly eta_when: string;
};

export type ExcuseDraft = {
  subject: string;
  body: string;
};

export type NormalizationStrategy =
  | "quoted_text_field"
  | "brace_scan"
  | "whole_content"
  | "key_value";

export type GenerationResult =
  | (ExcuseDraft & {
      kind: "success";
      strategy: NormalizationStrategy;
    })
  | {
      kind: "failure";
      diagnostic: string;
    };

export type ExcuseResponse = {
  subject: string;
  body: string;
  success: boolean;
  error: string | null;
};
