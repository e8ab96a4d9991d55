export type PiiCategory = "email" | "ssn" | "dob" | "credit_card" | "phone";

export type PiiMatch = {
  category: PiiCategory;
  original: string;
  /** Placeholder written in place of the span, or null for a detect-only match. */
  replacement: string | null;
  start: number;
  end: number;
};

export type RedactionResult = {
  originalLength: number;
  redacted: string;
  matches: PiiMatch[];
  counts: Record<PiiCategory, number>;
  hasPii: boolean;
};

/** Per-category action: replace the span with `placeholder`, or leave it in place. */
export type CategoryAction = { mode: "mask"; placeholder: string } | { mode: "detect" };

export type RedactionPolicy = Record<PiiCategory, CategoryAction>;

export type RedactionPolicyName = "default" | "strict";

export type RedactOptions = {
  categories?: PiiCategory[];
  policy?: RedactionPolicy | RedactionPolicyName;
};

export type Span = { start: number; end: number };

/**
 * Leftmost span starting at or after `from`, with boundaries evaluated against
 * the whole text. Successive calls on one finder may pass a non-decreasing
 * `from` and reuse work done by earlier calls.
 */
export type SpanFinder = (from: number) => Span | null;

export type PiiRule = {
  category: PiiCategory;
  priority: number;
  scanner: (text: string) => SpanFinder;
};
