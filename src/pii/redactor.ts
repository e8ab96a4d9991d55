import { PII_CATEGORIES, PII_RULES, resolvePolicy } from "./patterns.js";
import type { PiiCategory, PiiMatch, PiiRule, RedactOptions, RedactionResult, Span } from "./types.js";

type Selected = { rule: Readonly<PiiRule>; span: Span };

/** Non-string input is stringified; null and undefined become the empty string. */
export function coerceText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  return String(value);
}

export function emptyCounts(): Record<PiiCategory, number> {
  return { email: 0, ssn: 0, dob: 0, credit_card: 0, phone: 0 };
}

function selectRules(categories?: PiiCategory[]): Readonly<PiiRule>[] {
  if (!categories) {
    return [...PII_RULES];
  }
  const wanted = new Set(categories);
  return PII_RULES.filter((rule) => wanted.has(rule.category));
}

/**
 * Merge every rule's candidates into one left-to-right pass of non-overlapping
 * spans. The leftmost candidate wins; at the same offset the rule with the
 * lower priority number wins. Each rule keeps its next candidate until the
 * cursor moves past that candidate's start, so a rule is re-run only after a
 * selected span has swallowed its pending match, and the cursor only moves
 * forward, so each finder can carry its progress from one call to the next.
 */
export function scanSpans(
  text: string,
  rules: readonly Readonly<PiiRule>[] = PII_RULES,
): Array<{ category: PiiCategory; start: number; end: number }> {
  const finders = rules.map((rule) => rule.scanner(text));
  const pending: Array<Span | null | undefined> = rules.map(() => undefined);
  const spans: Array<{ category: PiiCategory; start: number; end: number }> = [];
  let cursor = 0;

  while (cursor < text.length) {
    let best: Selected | null = null;

    for (let i = 0; i < rules.length; i++) {
      let candidate = pending[i];
      if (candidate === undefined || (candidate !== null && candidate.start < cursor)) {
        candidate = finders[i](cursor);
        pending[i] = candidate;
      }
      if (!candidate) {
        continue;
      }
      if (
        best === null ||
        candidate.start < best.span.start ||
        (candidate.start === best.span.start && rules[i].priority < best.rule.priority)
      ) {
        best = { rule: rules[i], span: candidate };
      }
    }

    if (!best) {
      break;
    }
    spans.push({ category: best.rule.category, start: best.span.start, end: best.span.end });
    cursor = best.span.end;
  }

  return spans;
}

export function redactText(input: unknown, opts?: RedactOptions): RedactionResult {
  const text = coerceText(input);
  const policy = resolvePolicy(opts?.policy);
  const counts = emptyCounts();
  const matches: PiiMatch[] = [];

  for (const span of scanSpans(text, selectRules(opts?.categories))) {
    const action = policy[span.category];
    counts[span.category] += 1;
    matches.push({
      category: span.category,
      original: text.slice(span.start, span.end),
      replacement: action.mode === "mask" ? action.placeholder : null,
      start: span.start,
      end: span.end,
    });
  }

  // Copy the gaps between matches verbatim, in order
  const parts: string[] = [];
  let last = 0;
  for (const m of matches) {
    parts.push(text.slice(last, m.start), m.replacement ?? m.original);
    last = m.end;
  }
  parts.push(text.slice(last));

  return {
    originalLength: text.length,
    redacted: parts.join(""),
    matches,
    counts,
    hasPii: matches.length > 0,
  };
}

export function redact(input: unknown, opts?: RedactOptions): string {
  return redactText(input, opts).redacted;
}

export function hasPii(input: unknown, opts?: RedactOptions): boolean {
  return redactText(input, opts).hasPii;
}

/** Distinct categories detected in the text, in precedence order. */
export function detectCategories(input: unknown): PiiCategory[] {
  const found = new Set(redactText(input).matches.map((m) => m.category));
  return PII_CATEGORIES.filter((category) => found.has(category));
}
