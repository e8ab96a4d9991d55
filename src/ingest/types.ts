import type { AnomalyReport } from "../anomaly/types.js";
import type { PiiCategory, RedactionPolicy, RedactionPolicyName } from "../pii/types.js";
import type { BlobStorage } from "../storage/types.js";

export type Submission = {
  filename: string;
  content: Uint8Array;
  contentType?: string;
  name: string;
  email: string;
  phone: string;
};

export type IngestDeps = {
  storage: BlobStorage;
  rawBucket: string;
  processedBucket: string;
  policy?: RedactionPolicy | RedactionPolicyName;
  now?: () => Date;
};

export type SubmissionMetadata = {
  name: string;
  email: string;
  phone: string;
  filename: string;
  uploaded_utc: string;
  phone_valid: boolean;
  anomaly: AnomalyReport;
};

export type ProcessedOutcome =
  | { ok: true; format: "csv" | "text"; uri: string; counts: Record<PiiCategory, number> }
  | { ok: false; error: string };

export type IngestResult = {
  rawKey: string;
  metaKey: string;
  processedKey: string;
  rawBucket: string;
  processedBucket: string;
  anomaly: AnomalyReport;
  processed: ProcessedOutcome;
};
