import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_PORTAL_FIELD_NAMES } from "../../pipeline/constants/portal-field-names.js";
import {
  loadCadCallsConfig,
  loadPortalFieldNames,
  siteNameFromBaseUrl
} from "../../pipeline/scripts/pipeline-config.js";
import { InvalidParameterError } from "../../pipeline/services/cad-calls-request-builder.js";

const BASE_ENV = { CAD_BASE_URL: "https://southmiamipdfl.policetocitizen.com/" };

const captureConfigError = (env: NodeJS.ProcessEnv): InvalidParameterError => {
  try {
    loadCadCallsConfig(env);
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected InvalidParameterError");
};

describe("loadCadCallsConfig", () => {
  it("applies defaults when only the base URL is set", () => {
    const config = loadCadCallsConfig(BASE_ENV);

    expect(config.baseUrl).toBe("https://southmiamipdfl.policetocitizen.com");
    expect(config.siteName).toBe("southmiamipdfl");
    expect(config.endpointPath).toBe("/api/CADCalls/{agencyId}");
    expect(config.api).toMatchObject({
      verifySsl: false,
      timeoutSeconds: 30,
      requestMethod: "POST",
      fallbackOnServerError: true
    });
    expect(config.defaults).toEqual({
      agencyId: undefined,
      includeOpen: true,
      includeClosed: false,
      take: 30,
      skip: 0,
      searchText: "",
      transportMethod: "PRIMARY"
    });
    expect(config.outputDirectory).toBe("cadcalls_results");
    expect(config.debugBodyLimit).toBe(2000);
    expect(config.fieldNames).toEqual(DEFAULT_PORTAL_FIELD_NAMES);
  });

  it("reads typed values from the environment", () => {
    const config = loadCadCallsConfig({
      ...BASE_ENV,
      CAD_AGENCY_ID: "386",
      CAD_VERIFY_SSL: "YES",
      CAD_TIMEOUT_SECONDS: "12.5",
      CAD_INCLUDE_CLOSED: "on",
      CAD_TAKE: "5",
      CAD_SKIP: "",
      CAD_SEARCH_TEXT: "Main St",
      CAD_REQUEST_METHOD: " get "
    });

    expect(config.api.verifySsl).toBe(true);
    expect(config.api.timeoutSeconds).toBe(12.5);
    expect(config.api.requestMethod).toBe("GET");
    expect(config.defaults).toEqual({
      agencyId: 386,
      includeOpen: true,
      includeClosed: true,
      take: 5,
      skip: 0,
      searchText: "Main St",
      transportMethod: "FALLBACK"
    });
  });

  it("requires a base URL", () => {
    const error = captureConfigError({});

    expect(Object.keys(error.fieldErrors)).toEqual(["CAD_BASE_URL"]);
    expect(error.message).toContain("CAD_BASE_URL is required");
  });

  it("rejects values that are not booleans", () => {
    const error = captureConfigError({ ...BASE_ENV, CAD_VERIFY_SSL: "maybe" });

    expect(error.fieldErrors.CAD_VERIFY_SSL).toEqual([
      'Expected a boolean (true/false), received "maybe"'
    ]);
  });

  it("rejects a zero page size", () => {
    const error = captureConfigError({ ...BASE_ENV, CAD_TAKE: "0" });

    expect(Object.keys(error.fieldErrors)).toEqual(["CAD_TAKE"]);
  });

  it("caps the timeout at what a timer can hold", () => {
    const error = captureConfigError({ ...BASE_ENV, CAD_TIMEOUT_SECONDS: "2200000" });

    expect(Object.keys(error.fieldErrors)).toEqual(["CAD_TIMEOUT_SECONDS"]);
    expect(loadCadCallsConfig({ ...BASE_ENV, CAD_TIMEOUT_SECONDS: "2147483" }).api.timeoutSeconds).toBe(
      2_147_483
    );
  });

  it("rejects an unsupported request method", () => {
    const error = captureConfigError({ ...BASE_ENV, CAD_REQUEST_METHOD: "PUT" });

    expect(Object.keys(error.fieldErrors)).toEqual(["CAD_REQUEST_METHOD"]);
  });
});

describe("loadPortalFieldNames", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "cad-calls-field-names-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeFieldNames = (contents: string): string => {
    const filePath = join(tmpDir, "field-names.json");
    writeFileSync(filePath, contents);
    return filePath;
  };

  it("returns the defaults without a path", () => {
    expect(loadPortalFieldNames(undefined)).toBe(DEFAULT_PORTAL_FIELD_NAMES);
  });

  it("merges overrides over the defaults and ignores unknown entries", () => {
    const filePath = writeFieldNames(
      JSON.stringify({
        response: { records: "Calls" },
        query: { take: "pageSize", bogus: "ignored" }
      })
    );

    const fieldNames = loadPortalFieldNames(filePath);

    expect(fieldNames.response).toEqual({ ...DEFAULT_PORTAL_FIELD_NAMES.response, records: "Calls" });
    expect(fieldNames.query).toEqual({ ...DEFAULT_PORTAL_FIELD_NAMES.query, take: "pageSize" });
    expect(fieldNames.body).toEqual(DEFAULT_PORTAL_FIELD_NAMES.body);
  });

  it("rejects unknown sections", () => {
    const filePath = writeFieldNames(JSON.stringify({ headers: { accept: "text/html" } }));

    expect(() => loadPortalFieldNames(filePath)).toThrow(InvalidParameterError);
    expect(() => loadPortalFieldNames(filePath)).toThrow("is invalid");
  });

  it("rejects a file that is not JSON", () => {
    const filePath = writeFieldNames("records: Calls");

    expect(() => loadPortalFieldNames(filePath)).toThrow("is not valid JSON");
  });

  it("reports a missing file", () => {
    expect(() => loadPortalFieldNames(join(tmpDir, "missing.json"))).toThrow(
      `Portal field-name file not found: ${join(tmpDir, "missing.json")}`
    );
  });

  it("reports a path that cannot be read", () => {
    expect(() => loadPortalFieldNames(tmpDir)).toThrow(InvalidParameterError);
    expect(() => loadPortalFieldNames(tmpDir)).toThrow(
      `Could not read portal field-name file ${tmpDir}: `
    );
  });

  it("is picked up through CAD_FIELD_NAMES_PATH", () => {
    const filePath = writeFieldNames(JSON.stringify({ response: { total: "Count" } }));

    const config = loadCadCallsConfig({ ...BASE_ENV, CAD_FIELD_NAMES_PATH: filePath });

    expect(config.fieldNames.response.total).toBe("Count");
  });
});

describe("siteNameFromBaseUrl", () => {
  it.each([
    ["https://southmiamipdfl.policetocitizen.com", "southmiamipdfl"],
    ["https://southmiamipdfl.policetocitizen.com/CADCalls", "southmiamipdfl"],
    ["http://localhost:8080", "localhost"],
    ["https://", "portal"]
  ])("%s -> %s", (baseUrl, expected) => {
    expect(siteNameFromBaseUrl(baseUrl)).toBe(expected);
  });
});
