import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import type { CallResultSet, DebugBundle } from "../../shared/contracts.js";
import { buildRequestSpec } from "../../pipeline/services/cad-calls-request-builder.js";
import { parseCallRecord } from "../../pipeline/utils/call-record-json.js";
import {
  formatFileTimestamp,
  readDebugBundle,
  readResultFile,
  writeDebugBundle,
  writeResultFile
} from "../../pipeline/utils/pipeline-io.js";
import { toCallRecords } from "../test-utils.js";

const NOW = new Date("2026-03-01T10:20:30.456Z");

const spec = buildRequestSpec({ agencyId: 386, includeOpen: true, includeClosed: false, take: 2 });

const resultSet: CallResultSet = {
  request: spec,
  retrievedAt: NOW.toISOString(),
  agencyId: 386,
  agencyName: "Example Police Department",
  siteName: "southmiamipdfl",
  total: 9,
  records: toCallRecords([
    { Zeta: "last key first", IncidentId: "26-001", Nested: { b: 2, a: 1 } },
    { IncidentId: "26-002", Extra: null }
  ])
};

const debugBundle: DebugBundle = {
  createdAt: NOW.toISOString(),
  request: spec,
  siteName: "southmiamipdfl",
  transportMethod: "PRIMARY",
  httpMethod: "POST",
  url: "https://southmiamipdfl.policetocitizen.com/api/CADCalls/386",
  status: 403,
  failure: { kind: "Blocked" },
  reason: "Response matched bot-detection signature: X-WAF block marker (x-waf: blocked)",
  requestHeaders: { Accept: "application/json" },
  requestPayload: { Take: 2 },
  responseHeaders: { "x-waf": "blocked" },
  body: "Forbidden",
  bodyLength: 9,
  bodyTruncated: false,
  attempts: [
    {
      method: "PRIMARY",
      httpMethod: "POST",
      url: "https://southmiamipdfl.policetocitizen.com/api/CADCalls/386",
      status: 403,
      error: null
    }
  ]
};

const withTempDir = (run: (directory: string) => void): void => {
  const tmpDir = mkdtempSync(join(tmpdir(), "cad-calls-pipeline-io-"));
  try {
    run(tmpDir);
  } finally {
    rmSync(tmpDir, { recursive: true, force: true });
  }
};

describe("formatFileTimestamp", () => {
  it("replaces characters that are unsafe in file names", () => {
    expect(formatFileTimestamp(NOW)).toBe("2026-03-01T10-20-30-456Z");
  });
});

describe("writeResultFile", () => {
  it("writes a stage output under a generated name", () => {
    withTempDir((tmpDir) => {
      const outputDirectory = join(tmpDir, "cadcalls_results");
      const messages: string[] = [];

      const filePath = writeResultFile(resultSet, {
        outputDirectory,
        now: () => NOW,
        log: (message) => messages.push(message)
      });

      expect(filePath).toBe(
        join(outputDirectory, "southmiamipdfl_cadcalls_386_2026-03-01T10-20-30-456Z.json")
      );
      expect(messages).toEqual([`  Saved ${filePath} (2 records)`]);

      const output = readResultFile(filePath);
      expect(output.stage).toBe("cad-calls");
      expect(output.version).toBe(1);
      expect(output.createdAt).toBe("2026-03-01T10:20:30.456Z");
      expect(output.metadata).toEqual({
        agencyId: 386,
        agencyName: "Example Police Department",
        siteName: "southmiamipdfl",
        retrievedAt: "2026-03-01T10:20:30.456Z",
        request: spec,
        total: 9,
        recordCount: 2
      });
      expect(output.records).toEqual(resultSet.records);
    });
  });

  it("keeps record text exactly as received", () => {
    const recordText = '{"b":"x","10":"y","IncidentId":9007199254740993,"Lat":25.700000}';
    const parsed = parseCallRecord(recordText);
    if (!parsed.ok) {
      throw new Error(parsed.message);
    }

    withTempDir((tmpDir) => {
      const filePath = writeResultFile(
        { ...resultSet, records: [parsed.record] },
        { outputDirectory: tmpDir, now: () => NOW }
      );

      expect(readFileSync(filePath, "utf-8")).toContain(`"records": [\n    ${recordText}\n  ]\n}\n`);

      const [record] = readResultFile(filePath).records;
      expect(record?.raw).toBe(recordText);
      expect(Object.keys(record?.fields ?? {})).toEqual(["10", "b", "IncidentId", "Lat"]);
    });
  });

  it("writes an empty record list", () => {
    withTempDir((tmpDir) => {
      const filePath = writeResultFile({ ...resultSet, records: [] }, { outputDirectory: tmpDir, now: () => NOW });

      expect(readFileSync(filePath, "utf-8").endsWith('  "records": []\n}\n')).toBe(true);
      expect(readResultFile(filePath).records).toEqual([]);
    });
  });

  it("adds a numeric suffix instead of overwriting an existing file", () => {
    withTempDir((tmpDir) => {
      const first = writeResultFile(resultSet, { outputDirectory: tmpDir, now: () => NOW });
      const second = writeResultFile(resultSet, { outputDirectory: tmpDir, now: () => NOW });

      expect(second).toBe(join(tmpDir, "southmiamipdfl_cadcalls_386_2026-03-01T10-20-30-456Z-1.json"));
      expect(first).not.toBe(second);
      expect(readdirSync(tmpDir)).toHaveLength(2);
    });
  });

  it("uses an explicit output path verbatim and creates its directories", () => {
    withTempDir((tmpDir) => {
      const outputPath = join(tmpDir, "nested", "deeper", "calls.json");

      const filePath = writeResultFile(resultSet, {
        outputDirectory: join(tmpDir, "unused"),
        outputPath,
        now: () => NOW
      });

      expect(filePath).toBe(outputPath);
      expect(existsSync(outputPath)).toBe(true);
      expect(existsSync(join(tmpDir, "unused"))).toBe(false);
    });
  });
});

describe("writeDebugBundle", () => {
  it("writes the bundle under a debug name", () => {
    withTempDir((tmpDir) => {
      const filePath = writeDebugBundle(debugBundle, { outputDirectory: tmpDir, now: () => NOW });

      expect(filePath).toBe(join(tmpDir, "southmiamipdfl_debug_386_2026-03-01T10-20-30-456Z.json"));

      const output = readDebugBundle(filePath);
      expect(output.stage).toBe("cad-calls-debug");
      expect(output.bundle).toEqual(debugBundle);
    });
  });
});

describe("readers", () => {
  it("throws when the result file does not exist", () => {
    expect(() => readResultFile("/nonexistent/calls.json")).toThrow("Result file not found");
  });

  it("rejects a file written by another stage", () => {
    withTempDir((tmpDir) => {
      const filePath = join(tmpDir, "other.json");
      writeFileSync(filePath, JSON.stringify({ stage: "cad-calls-debug", version: 1 }));

      expect(() => readResultFile(filePath)).toThrow(
        `Result file ${filePath} has stage "cad-calls-debug" but expected "cad-calls".`
      );
    });
  });

  it("rejects an unknown result version", () => {
    withTempDir((tmpDir) => {
      const filePath = join(tmpDir, "future.json");
      writeFileSync(filePath, JSON.stringify({ stage: "cad-calls", version: 2 }));

      expect(() => readResultFile(filePath)).toThrow("has version 2 but expected 1");
    });
  });
});
