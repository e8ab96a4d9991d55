export {
  coerceText,
  detectCategories,
  hasPii,
  redact,
  redactText,
  scanSpans,
} from "./pii/redactor.js";
export { redactCsv, redactTable, type TableRedactionResult } from "./pii/table.js";
export {
  DEFAULT_POLICY,
  PII_CATEGORIES,
  PII_RULES,
  REDACTED_CARD,
  REDACTED_DOB,
  REDACTED_EMAIL,
  REDACTED_PHONE,
  REDACTED_SSN,
  STRICT_POLICY,
  emailScanner,
  findEmail,
  resolvePolicy,
} from "./pii/patterns.js";
export type {
  CategoryAction,
  PiiCategory,
  PiiMatch,
  PiiRule,
  RedactOptions,
  RedactionPolicy,
  RedactionPolicyName,
  RedactionResult,
  Span,
  SpanFinder,
} from "./pii/types.js";
export { parseCsv, serializeCsv, type Table } from "./tabular/csv.js";
export {
  ANOMALY_ISSUES,
  detectAnomalies,
  isSequential,
  isValidEmail,
  isValidPhone,
} from "./anomaly/validate.js";
export type { AnomalyDetail, AnomalyField, AnomalyReport } from "./anomaly/types.js";
export { decodeUtf8, formatTimestamp, ingestSubmission } from "./ingest/pipeline.js";
export type {
  IngestDeps,
  IngestResult,
  ProcessedOutcome,
  Submission,
  SubmissionMetadata,
} from "./ingest/types.js";
export { LocalBlobStorage } from "./storage/local.js";
export type { BlobStorage } from "./storage/types.js";
export { ConfigError, IntakeError, StorageError } from "./errors.js";
export { loadConfig, type IntakeConfig } from "./config/env.js";
export { createSubsystemLogger, type SubsystemLogger } from "./logging/subsystem.js";
