import { findEmail } from "../pii/patterns.js";
import { coerceText } from "../pii/redactor.js";
import type { AnomalyDetail, AnomalyReport } from "./types.js";

const PLACEHOLDER_EMAILS = new Set([
  "test@test.com",
  "admin@admin.com",
  "user@user.com",
  "example@example.com",
  "fake@fake.com",
  "dummy@dummy.com",
]);

const JUNK_PHONE_DIGITS = new Set([
  ...Array.from({ length: 10 }, (_, d) => String(d).repeat(10)),
  "1234567890",
  "0987654321",
]);

const PLACEHOLDER_NAMES = new Set(["test", "admin", "user", "dummy", "fake", "example"]);

export const ANOMALY_ISSUES = {
  email: "Invalid or suspicious email format",
  phone: "Invalid or suspicious phone format",
  nameLength: "Name too short or empty",
  nameDenylist: "Suspicious test/dummy name detected",
} as const;

/** True when every adjacent pair steps by exactly +1, or every pair by exactly -1. */
export function isSequential(digits: string): boolean {
  if (digits.length < 4) {
    return false;
  }
  let ascending = true;
  let descending = true;
  for (let i = 1; i < digits.length; i++) {
    const step = Number(digits[i]) - Number(digits[i - 1]);
    if (step !== 1) ascending = false;
    if (step !== -1) descending = false;
  }
  return ascending || descending;
}

export function isValidEmail(email: unknown): boolean {
  if (typeof email !== "string") {
    return false;
  }
  if (findEmail(email, 0)?.start !== 0) {
    return false;
  }

  const at = email.lastIndexOf("@");
  const local = email.slice(0, at);
  const domain = email.slice(at + 1);
  if (local.length === 0 || local.length > 64) {
    return false;
  }
  if (domain.length === 0 || domain.length > 255) {
    return false;
  }

  if (PLACEHOLDER_EMAILS.has(email.toLowerCase())) {
    return false;
  }

  // Low-variety locals such as "aaaa" or "abab"
  const distinct = new Set(local.replace(/[._-]/g, ""));
  if (distinct.size <= 2 && local.length > 3) {
    return false;
  }

  const labels = domain.split(".");
  if (labels.length < 2) {
    return false;
  }
  const tld = labels[labels.length - 1];
  return tld.length >= 2 && /^\p{L}+$/u.test(tld);
}

export function isValidPhone(phone: unknown): boolean {
  if (typeof phone !== "string") {
    return false;
  }
  const digits = phone.replace(/\D/g, "");

  if (digits.length < 7 || digits.length > 15) {
    return false;
  }
  if (new Set(digits).size === 1) {
    return false;
  }
  if (isSequential(digits)) {
    return false;
  }
  return !JUNK_PHONE_DIGITS.has(digits);
}

/**
 * Run every contact-field check and collect one detail per failure, in the
 * order email, phone, name length, name denylist. No check short-circuits
 * another.
 */
export function detectAnomalies(name: unknown, email: unknown, phone: unknown): AnomalyReport {
  const details: AnomalyDetail[] = [];
  const nameText = typeof name === "string" ? name : "";

  if (!isValidEmail(email)) {
    details.push({ field: "email", value: coerceText(email), issue: ANOMALY_ISSUES.email });
  }
  if (!isValidPhone(phone)) {
    details.push({ field: "phone", value: coerceText(phone), issue: ANOMALY_ISSUES.phone });
  }
  if (nameText.trim().length < 2) {
    details.push({ field: "name", value: nameText, issue: ANOMALY_ISSUES.nameLength });
  }
  if (PLACEHOLDER_NAMES.has(nameText.trim().toLowerCase())) {
    details.push({ field: "name", value: nameText, issue: ANOMALY_ISSUES.nameDenylist });
  }

  return { has_anomaly: details.length > 0, anomaly_details: details };
}
