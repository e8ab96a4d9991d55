import type {
  PiiCategory,
  PiiRule,
  RedactionPolicy,
  RedactionPolicyName,
  Span,
  SpanFinder,
} from "./types.js";

export const REDACTED_EMAIL = "[REDACTED_EMAIL]";
export const REDACTED_PHONE = "[REDACTED_PHONE]";
export const REDACTED_SSN = "[REDACTED_SSN]";
export const REDACTED_DOB = "[REDACTED_DOB]";
export const REDACTED_CARD = "[REDACTED_CARD]";

const MONTH = "(?:0[1-9]|1[0-2])";
const DAY = "(?:0[1-9]|[12]\\d|3[01])";
const YEAR = "(?:19\\d{2}|20\\d{2})";

// Every quantifier below is bounded, so each regex does constant work per start position.
const SSN_RE = /\b\d{3}-\d{2}-\d{4}\b/;
const DOB_RE = new RegExp(
  "\\b(?:" +
    [
      `${YEAR}-${MONTH}-${DAY}`,
      `${MONTH}-${DAY}-${YEAR}`,
      `${DAY}-${MONTH}-${YEAR}`,
      `${MONTH}/${DAY}/${YEAR}`,
      `${DAY}/${MONTH}/${YEAR}`,
    ].join("|") +
    ")\\b",
);
const CARD_RE = /\b\d(?:[ -]?\d){12,18}\b/;
const PHONE_RE =
  /(?<!\d)(?:\+?\d{1,3}[\s\-.]?)?(?:\(?\d{2,4}\)?[\s\-.]?)?(?:\d[\s\-.]?){6,14}\d(?!\d)/;

const LOCAL_CHAR = /[A-Za-z0-9._%+-]/;
const DOMAIN_CHAR = /[A-Za-z0-9.-]/;
const ALPHA = /[A-Za-z]/;
const WORD_CHAR = /[A-Za-z0-9_]/;

function isWordAt(text: string, index: number): boolean {
  return index >= 0 && index < text.length && WORD_CHAR.test(text[index]);
}

function isBoundary(text: string, index: number): boolean {
  return isWordAt(text, index - 1) !== isWordAt(text, index);
}

function regexScanner(pattern: RegExp): PiiRule["scanner"] {
  return (text) => {
    const re = new RegExp(pattern.source, "g");
    return (from) => {
      re.lastIndex = from;
      const match = re.exec(text);
      if (!match) {
        return null;
      }
      return { start: match.index, end: match.index + match[0].length };
    };
  };
}

/**
 * End of the domain after `at`: the last `.` in the domain run that is
 * preceded by at least one domain character and followed by a whole
 * alphabetic label of length >= 2 ending on a word boundary. -1 when none.
 */
function domainEnd(text: string, at: number): number {
  let runEnd = at + 1;
  while (runEnd < text.length && DOMAIN_CHAR.test(text[runEnd])) {
    runEnd++;
  }
  for (let dot = runEnd - 1; dot >= at + 2; dot--) {
    if (text[dot] !== ".") {
      continue;
    }
    let end = dot + 1;
    while (end < runEnd && ALPHA.test(text[end])) {
      end++;
    }
    if (end - dot - 1 >= 2 && !isWordAt(text, end)) {
      return end;
    }
  }
  return -1;
}

type AtState = {
  at: number;
  /** Left edge of the local-part run ending at `at`. */
  runStart: number;
  /** Next local-part position not yet ruled out as a start. */
  next: number;
  /** Cached domain end; undefined until first needed. */
  end: number | undefined;
};

function atState(text: string, at: number): AtState {
  let runStart = at;
  while (runStart > 0 && LOCAL_CHAR.test(text[runStart - 1])) {
    runStart--;
  }
  return { at, runStart, next: runStart, end: undefined };
}

/**
 * Finds `local@domain.tld` spans by anchoring on each `@`. The start is the
 * leftmost word boundary in the local-part run at or after `from`. Each `@`
 * keeps its run edge, boundary cursor and domain end across calls, and an
 * `@` that fails once is never revisited, so a whole scan with a rising
 * `from` touches every character a bounded number of times.
 */
export function emailScanner(text: string): SpanFinder {
  let state: AtState | null = null;
  let started = false;
  let lastFrom = 0;

  const advance = (from: number): AtState | null => {
    const at = text.indexOf("@", from);
    return at === -1 ? null : atState(text, at);
  };

  return (from) => {
    if (!started || from < lastFrom || (state !== null && state.at < from)) {
      state = advance(from);
      started = true;
    }
    lastFrom = from;

    while (state !== null) {
      let pos = Math.max(state.next, state.runStart, from);
      while (pos < state.at && !isBoundary(text, pos)) {
        pos++;
      }
      state.next = pos;
      if (pos < state.at) {
        if (state.end === undefined) {
          state.end = domainEnd(text, state.at);
        }
        if (state.end !== -1) {
          return { start: pos, end: state.end };
        }
      }
      state = advance(state.at + 1);
    }
    return null;
  };
}

export function findEmail(text: string, from: number): Span | null {
  return emailScanner(text)(from);
}

const RULES: PiiRule[] = [
  { category: "email", priority: 0, scanner: emailScanner },
  { category: "ssn", priority: 1, scanner: regexScanner(SSN_RE) },
  { category: "dob", priority: 2, scanner: regexScanner(DOB_RE) },
  { category: "credit_card", priority: 3, scanner: regexScanner(CARD_RE) },
  { category: "phone", priority: 4, scanner: regexScanner(PHONE_RE) },
];

/** Detection rules in precedence order; lower priority wins a tie at the same offset. */
export const PII_RULES: readonly Readonly<PiiRule>[] = Object.freeze(
  RULES.map((rule) => Object.freeze(rule)),
);

export const PII_CATEGORIES: readonly PiiCategory[] = Object.freeze(
  PII_RULES.map((rule) => rule.category),
);

// SSN, DOB and card numbers are detected but left in place unless a caller opts into "strict".
export const DEFAULT_POLICY: Readonly<RedactionPolicy> = Object.freeze({
  email: { mode: "mask", placeholder: REDACTED_EMAIL },
  ssn: { mode: "detect" },
  dob: { mode: "detect" },
  credit_card: { mode: "detect" },
  phone: { mode: "mask", placeholder: REDACTED_PHONE },
} satisfies RedactionPolicy);

export const STRICT_POLICY: Readonly<RedactionPolicy> = Object.freeze({
  email: { mode: "mask", placeholder: REDACTED_EMAIL },
  ssn: { mode: "mask", placeholder: REDACTED_SSN },
  dob: { mode: "mask", placeholder: REDACTED_DOB },
  credit_card: { mode: "mask", placeholder: REDACTED_CARD },
  phone: { mode: "mask", placeholder: REDACTED_PHONE },
} satisfies RedactionPolicy);

const NAMED_POLICIES: Record<RedactionPolicyName, Readonly<RedactionPolicy>> = {
  default: DEFAULT_POLICY,
  strict: STRICT_POLICY,
};

export function resolvePolicy(
  policy?: RedactionPolicy | RedactionPolicyName,
): Readonly<RedactionPolicy> {
  if (policy === undefined) {
    return DEFAULT_POLICY;
  }
  return typeof policy === "string" ? NAMED_POLICIES[policy] : policy;
}
