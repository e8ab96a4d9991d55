import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { afterAll, afterEach, beforeAll, describe, it, expect, vi } from "vitest";

vi.mock("./logging/subsystem.js", () => ({
  createSubsystemLogger: () => ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
    isEnabled: vi.fn(() => false),
    subsystem: "test",
  }),
}));

import { buildProgram } from "./cli.js";

const tmpDir = path.join("/tmp", `cli-test-${randomUUID()}`);

function captured(spy: { mock: { calls: unknown[][] } }): string {
  return spy.mock.calls.map((call) => String(call[0])).join("");
}

describe("intake-guard cli", () => {
  const previousExitCode = process.exitCode;

  beforeAll(() => {
    fs.mkdirSync(tmpDir, { recursive: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = previousExitCode;
  });

  afterAll(() => {
    try {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    } catch {
      // ignore
    }
  });

  it("check prints a clean report", async () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    await buildProgram().parseAsync(
      ["check", "--name", "Jane Doe", "--email", "jane.doe@example.org", "--phone", "4155552671"],
      { from: "user" },
    );

    expect(JSON.parse(captured(stdout))).toEqual({ has_anomaly: false, anomaly_details: [] });
    expect(process.exitCode).toBe(previousExitCode);
  });

  it("check sets a failing exit code when anomalies are found", async () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    await buildProgram().parseAsync(
      ["check", "--name", "Test", "--email", "test@test.com", "--phone", "1111111111"],
      { from: "user" },
    );

    const report = JSON.parse(captured(stdout));
    expect(report.has_anomaly).toBe(true);
    expect(report.anomaly_details).toHaveLength(3);
    expect(process.exitCode).toBe(1);
  });

  it("redact writes a redacted CSV and reports counts", async () => {
    const input = path.join(tmpDir, "people.csv");
    const output = path.join(tmpDir, "people.redacted.csv");
    fs.writeFileSync(input, "name,contact\nAnn,ann@example.com\nBob,555-123-4567\n");
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    await buildProgram().parseAsync(["redact", input, "--out", output], { from: "user" });

    expect(fs.readFileSync(output, "utf-8")).toBe(
      "name,contact\nAnn,[REDACTED_EMAIL]\nBob,[REDACTED_PHONE]\n",
    );
    expect(captured(stderr)).toBe("email=1 ssn=0 dob=0 credit_card=0 phone=1\n");
  });

  it("redact --strict masks detect-only categories", async () => {
    const input = path.join(tmpDir, "note.txt");
    fs.writeFileSync(input, "SSN 123-45-6789");
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    await buildProgram().parseAsync(["redact", input, "--strict"], { from: "user" });

    expect(captured(stdout)).toBe("SSN [REDACTED_SSN]");
  });
});
