import { describe, it, expect } from "vitest";
import { REDACTED_EMAIL, REDACTED_PHONE } from "./patterns.js";
import { coerceText, detectCategories, hasPii, redact, redactText } from "./redactor.js";

describe("redactText", () => {
  describe("precedence", () => {
    it("masks an email and a phone number in the same sentence", () => {
      const result = redactText("Contact jane.doe@example.org or 555-123-4567");
      expect(result.redacted).toBe("Contact [REDACTED_EMAIL] or [REDACTED_PHONE]");
      expect(result.matches).toEqual([
        {
          category: "email",
          original: "jane.doe@example.org",
          replacement: REDACTED_EMAIL,
          start: 8,
          end: 28,
        },
        {
          category: "phone",
          original: "555-123-4567",
          replacement: REDACTED_PHONE,
          start: 32,
          end: 44,
        },
      ]);
    });

    it("prefers the email rule when an email and a phone start at the same offset", () => {
      expect(redact("5551234567@mail.com")).toBe("[REDACTED_EMAIL]");
    });

    it("takes the leftmost span before considering priority", () => {
      expect(redact("555-123-4567 then a@b.io")).toBe("[REDACTED_PHONE] then [REDACTED_EMAIL]");
    });

    it("lets an SSN claim its digits before the phone rule", () => {
      const result = redactText("SSN 123-45-6789 on file");
      expect(result.redacted).toBe("SSN 123-45-6789 on file");
      expect(result.matches).toHaveLength(1);
      expect(result.matches[0].category).toBe("ssn");
      expect(result.matches[0].replacement).toBeNull();
    });

    it("lets a date of birth claim its digits before the phone rule", () => {
      const result = redactText("born 12-25-1990 in Ohio");
      expect(result.redacted).toBe("born 12-25-1990 in Ohio");
      expect(result.matches.map((m) => m.category)).toEqual(["dob"]);
    });

    it("lets a card number claim its digits before the phone rule", () => {
      const result = redactText("card 4111 1111 1111 1111 exp");
      expect(result.redacted).toBe("card 4111 1111 1111 1111 exp");
      expect(result.matches).toHaveLength(1);
      expect(result.matches[0].category).toBe("credit_card");
      expect(result.matches[0].original).toBe("4111 1111 1111 1111");
    });

    it("treats an out-of-range date as a phone number", () => {
      const result = redactText("ref 13-45-2020 end");
      expect(result.redacted).toBe("ref [REDACTED_PHONE] end");
      expect(result.matches[0].category).toBe("phone");
    });
  });

  describe("phone boundaries", () => {
    it("never matches a six digit run", () => {
      const text = "code 123456 here";
      expect(redact(text)).toBe(text);
    });

    it("matches a seven digit run", () => {
      expect(redact("call 1234567 now")).toBe("call [REDACTED_PHONE] now");
    });

    it("masks a parenthesised area code with country prefix", () => {
      expect(redact("Phone: +1 (415) 555-2671.")).toBe("Phone: [REDACTED_PHONE].");
    });
  });

  describe("policies", () => {
    it("masks detect-only categories under the strict policy", () => {
      expect(redact("SSN 123-45-6789 on file", { policy: "strict" })).toBe(
        "SSN [REDACTED_SSN] on file",
      );
      expect(redact("born 12-25-1990 in Ohio", { policy: "strict" })).toBe(
        "born [REDACTED_DOB] in Ohio",
      );
      expect(redact("card 4111 1111 1111 1111", { policy: "strict" })).toBe("card [REDACTED_CARD]");
    });

    it("accepts a custom policy object", () => {
      const text = "mail a@b.io or 555-123-4567";
      const result = redact(text, {
        policy: {
          email: { mode: "detect" },
          ssn: { mode: "detect" },
          dob: { mode: "detect" },
          credit_card: { mode: "detect" },
          phone: { mode: "mask", placeholder: "<phone>" },
        },
      });
      expect(result).toBe("mail a@b.io or <phone>");
    });
  });

  describe("category filtering", () => {
    it("only runs the requested rules", () => {
      const text = "mail a@b.io or 555-123-4567";
      expect(redact(text, { categories: ["email"] })).toBe("mail [REDACTED_EMAIL] or 555-123-4567");
    });

    it("lets the phone rule take an SSN when the SSN rule is excluded", () => {
      expect(redact("SSN 123-45-6789 on file", { categories: ["phone"] })).toBe(
        "SSN [REDACTED_PHONE] on file",
      );
    });
  });

  describe("text without PII", () => {
    it("returns unchanged text when no PII present", () => {
      const text = "The report is due on Friday.";
      const result = redactText(text);
      expect(result.redacted).toBe(text);
      expect(result.hasPii).toBe(false);
      expect(result.matches).toHaveLength(0);
      expect(result.originalLength).toBe(text.length);
    });

    it("returns unchanged text for empty string", () => {
      const result = redactText("");
      expect(result.redacted).toBe("");
      expect(result.hasPii).toBe(false);
      expect(result.originalLength).toBe(0);
    });

    it("does not match its own placeholders", () => {
      const text = "[REDACTED_EMAIL] [REDACTED_PHONE]";
      expect(redact(text)).toBe(text);
    });

    it("leaves every placeholder alone under the strict policy", () => {
      const text = "[REDACTED_EMAIL][REDACTED_PHONE] [REDACTED_SSN] [REDACTED_DOB] [REDACTED_CARD]";
      expect(redact(text, { policy: "strict" })).toBe(text);
    });
  });

  describe("output structure", () => {
    it("copies everything outside matches verbatim", () => {
      expect(redact("  a\t555-123-4567\n b ")).toBe("  a\t[REDACTED_PHONE]\n b ");
    });

    it("is idempotent on ordinary text", () => {
      const samples = [
        "Contact jane.doe@example.org or 555-123-4567",
        "SSN 123-45-6789, DOB 1985-04-12, card 4111-1111-1111-1111",
        "Call +44 20 7946 0958 or write to ops@corp.example.co.uk.",
      ];
      for (const text of samples) {
        const once = redact(text);
        expect(redact(once)).toBe(once);
      }
    });

    it("keeps earlier placeholders when a second pass finds an uncovered email", () => {
      const once = redact("+12345678a@x.com");
      expect(once).toBe("[REDACTED_PHONE]a@x.com");

      const twice = redact(once);
      expect(twice).toBe("[REDACTED_PHONE][REDACTED_EMAIL]");
      expect(redact(twice)).toBe(twice);
    });

    it("counts detected spans per category", () => {
      const result = redactText("a@b.io, 555-123-4567 and 555-987-6543; SSN 123-45-6789");
      expect(result.counts).toEqual({ email: 1, ssn: 1, dob: 0, credit_card: 0, phone: 2 });
    });

    it("completes on long runs without PII", () => {
      const text = "a".repeat(200_000);
      expect(redact(text)).toBe(text);
    });

    it("completes on long digit runs", () => {
      const text = "1 ".repeat(38_000);
      expect(redact(text)).toBe(text);
    });

    it("stays linear when phones keep overtaking a pending email", () => {
      const k = 20_000;
      const domain = "a".repeat(10 * k) + ".com";
      const text = "(55) " + "1234-5678x".repeat(k) + "@" + domain;

      const started = performance.now();
      const result = redactText(text);
      const elapsed = performance.now() - started;

      expect(result.counts).toEqual({ email: 0, ssn: 0, dob: 0, credit_card: 0, phone: k });
      expect(result.redacted).toBe(
        "[REDACTED_PHONE]" + "x[REDACTED_PHONE]".repeat(k - 1) + "x@" + domain,
      );
      expect(elapsed).toBeLessThan(1000);
    });
  });

  describe("input coercion", () => {
    it("stringifies non-string input", () => {
      expect(redact(5551234567)).toBe("[REDACTED_PHONE]");
      expect(redact(42)).toBe("42");
    });

    it("treats null and undefined as empty text", () => {
      expect(redact(null)).toBe("");
      expect(coerceText(undefined)).toBe("");
    });
  });
});

describe("hasPii", () => {
  it("reports detect-only matches too", () => {
    expect(hasPii("SSN 123-45-6789")).toBe(true);
    expect(hasPii("nothing here")).toBe(false);
  });
});

describe("detectCategories", () => {
  it("lists each category once in precedence order", () => {
    expect(detectCategories("555-123-4567, a@b.io, 555-987-6543")).toEqual(["email", "phone"]);
  });
});
