import path from "node:path";
import { detectAnomalies, isValidPhone } from "../anomaly/validate.js";
import { errorMessage } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { redactText } from "../pii/redactor.js";
import { redactCsv } from "../pii/table.js";
import type {
  IngestDeps,
  IngestResult,
  ProcessedOutcome,
  Submission,
  SubmissionMetadata,
} from "./types.js";

const log = createSubsystemLogger("ingest:pipeline");

const pad = (n: number) => String(n).padStart(2, "0");

/** UTC timestamp used as the key prefix, e.g. `20240131-235959`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const ENCODED_REPLACEMENT_CHAR = Buffer.from([0xef, 0xbf, 0xbd]);

/**
 * UTF-8 decode that drops invalid byte sequences instead of substituting them.
 * A leading byte order mark is stripped; an encoded U+FFFD in the input is kept.
 */
export function decodeUtf8(content: Uint8Array): string {
  const bytes = Buffer.from(content);
  const body = bytes.subarray(0, 3).equals(UTF8_BOM) ? bytes.subarray(3) : bytes;
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(body);
  } catch (err) {
    if (!(err instanceof TypeError)) {
      throw err;
    }
    return decodeDroppingInvalid(body);
  }
}

// Between encoded U+FFFD characters, any U+FFFD the decoder emits stands for invalid bytes.
function decodeDroppingInvalid(bytes: Buffer): string {
  const decoder = new TextDecoder("utf-8", { ignoreBOM: true });
  const clean = (chunk: Buffer) => decoder.decode(chunk).replace(/\uFFFD/g, "");
  const parts: string[] = [];
  let from = 0;
  let hit = bytes.indexOf(ENCODED_REPLACEMENT_CHAR, from);
  while (hit !== -1) {
    parts.push(clean(bytes.subarray(from, hit)));
    from = hit + ENCODED_REPLACEMENT_CHAR.length;
    hit = bytes.indexOf(ENCODED_REPLACEMENT_CHAR, from);
  }
  parts.push(clean(bytes.subarray(from)));
  return parts.join("\uFFFD");
}

function safeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, "/")).trim();
  return base === "" || base === "." || base === ".." ? "upload" : base;
}

export async function ingestSubmission(
  submission: Submission,
  deps: IngestDeps,
): Promise<IngestResult> {
  const { storage, rawBucket, processedBucket } = deps;
  const ts = formatTimestamp((deps.now ?? (() => new Date()))());
  const filename = safeFilename(submission.filename);
  const stem = path.parse(filename).name || "upload";

  const rawKey = `raw/${ts}-${filename}`;
  await storage.put(
    rawBucket,
    rawKey,
    submission.content,
    submission.contentType || "application/octet-stream",
  );
  log.info(`stored raw upload ${rawBucket}/${rawKey}`, { bytes: submission.content.byteLength });

  const anomaly = detectAnomalies(submission.name, submission.email, submission.phone);
  const metadata: SubmissionMetadata = {
    name: submission.name,
    email: submission.email,
    phone: submission.phone,
    filename,
    uploaded_utc: ts,
    phone_valid: isValidPhone(submission.phone),
    anomaly,
  };
  const metaKey = `raw/${ts}-${stem}.json`;
  await storage.put(
    rawBucket,
    metaKey,
    Buffer.from(JSON.stringify(metadata), "utf-8"),
    "application/json",
  );
  if (anomaly.has_anomaly) {
    log.warn(`submission ${metaKey} flagged`, {
      fields: anomaly.anomaly_details.map((d) => d.field),
    });
  }

  const processedKey = `processed/${ts}-redacted-${filename}`;
  const processed = await storeRedactedCopy(submission.content, filename, processedKey, deps);

  return { rawKey, metaKey, processedKey, rawBucket, processedBucket, anomaly, processed };
}

/**
 * Redact the upload and store the copy. A failure here is logged and
 * reported on the result so the raw upload and metadata still stand.
 */
async function storeRedactedCopy(
  content: Uint8Array,
  filename: string,
  key: string,
  deps: IngestDeps,
): Promise<ProcessedOutcome> {
  try {
    const text = decodeUtf8(content);
    if (filename.toLowerCase().endsWith(".csv")) {
      const { csv, counts } = redactCsv(text, { policy: deps.policy });
      const uri = await deps.storage.put(deps.processedBucket, key, Buffer.from(csv, "utf-8"), "text/csv");
      return { ok: true, format: "csv", uri, counts };
    }
    const { redacted, counts } = redactText(text, { policy: deps.policy });
    const uri = await deps.storage.put(
      deps.processedBucket,
      key,
      Buffer.from(redacted, "utf-8"),
      "text/plain",
    );
    return { ok: true, format: "text", uri, counts };
  } catch (err) {
    const message = errorMessage(err);
    log.error(`processing failed for ${key}: ${message}`);
    return { ok: false, error: message };
  }
}
