import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import { z } from "zod";
import { detectAnomalies } from "./anomaly/validate.js";
import { loadConfig, loadDotEnv } from "./config/env.js";
import { resolveUploadsDir } from "./config/paths.js";
import { errorMessage } from "./errors.js";
import { ingestSubmission } from "./ingest/pipeline.js";
import { createSubsystemLogger } from "./logging/subsystem.js";
import { redactText } from "./pii/redactor.js";
import { redactCsv } from "./pii/table.js";
import type { PiiCategory } from "./pii/types.js";
import { LocalBlobStorage } from "./storage/local.js";

const log = createSubsystemLogger("cli");

const RedactOptsSchema = z.object({
  csv: z.boolean().optional(),
  strict: z.boolean().optional(),
  out: z.string().optional(),
});

const ContactOptsSchema = z.object({
  name: z.string(),
  email: z.string(),
  phone: z.string(),
});

function formatCounts(counts: Record<PiiCategory, number>): string {
  return Object.entries(counts)
    .map(([category, n]) => `${category}=${n}`)
    .join(" ");
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("intake-guard")
    .description("Redact PII from uploads and flag suspicious contact details")
    .version("0.1.0");

  program
    .command("redact")
    .description("Redact a text or CSV file")
    .argument("<file>", "input file")
    .option("--csv", "treat the input as CSV (default: inferred from .csv extension)")
    .option("--strict", "mask SSNs, dates of birth and card numbers as well")
    .option("--out <file>", "write the result to a file instead of stdout")
    .action(async (file: string, rawOpts: unknown) => {
      const opts = RedactOptsSchema.parse(rawOpts);
      const config = loadConfig();
      const policy = opts.strict ? "strict" : config.redactionPolicy;
      const input = await readFile(file, "utf-8");
      const asCsv = opts.csv ?? file.toLowerCase().endsWith(".csv");

      let output: string;
      let counts: Record<PiiCategory, number>;
      if (asCsv) {
        ({ csv: output, counts } = redactCsv(input, { policy }));
      } else {
        ({ redacted: output, counts } = redactText(input, { policy }));
      }

      if (opts.out) {
        await writeFile(opts.out, output, "utf-8");
      } else {
        process.stdout.write(output);
      }
      process.stderr.write(`${formatCounts(counts)}\n`);
    });

  program
    .command("check")
    .description("Validate submitted contact details and print the anomaly report")
    .requiredOption("--name <name>", "submitter name")
    .requiredOption("--email <email>", "submitter email")
    .requiredOption("--phone <phone>", "submitter phone")
    .action((rawOpts: unknown) => {
      const { name, email, phone } = ContactOptsSchema.parse(rawOpts);
      const report = detectAnomalies(name, email, phone);
      process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
      if (report.has_anomaly) {
        process.exitCode = 1;
      }
    });

  program
    .command("ingest")
    .description("Store an upload with its metadata and a redacted copy in local storage")
    .argument("<file>", "file to ingest")
    .requiredOption("--name <name>", "submitter name")
    .requiredOption("--email <email>", "submitter email")
    .requiredOption("--phone <phone>", "submitter phone")
    .option("--content-type <type>", "content type of the upload")
    .action(async (file: string, rawOpts: unknown) => {
      const opts = ContactOptsSchema.extend({ contentType: z.string().optional() }).parse(rawOpts);
      const config = loadConfig();
      const storage = new LocalBlobStorage(resolveUploadsDir());
      const result = await ingestSubmission(
        {
          filename: path.basename(file),
          content: await readFile(file),
          contentType: opts.contentType,
          name: opts.name,
          email: opts.email,
          phone: opts.phone,
        },
        {
          storage,
          rawBucket: config.rawBucket,
          processedBucket: config.processedBucket,
          policy: config.redactionPolicy,
        },
      );
      process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  loadDotEnv();
  try {
    await buildProgram().parseAsync(argv);
  } catch (err) {
    log.error(errorMessage(err));
    process.stderr.write(`intake-guard: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  }
}
