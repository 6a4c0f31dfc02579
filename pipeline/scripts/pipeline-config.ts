import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import "dotenv/config";
import type { HttpMethod } from "../../shared/contracts.js";
import { DEFAULT_OUTPUT_DIRECTORY } from "../../shared/pipeline-types.js";
import {
  DEFAULT_ENDPOINT_PATH,
  DEFAULT_PORTAL_FIELD_NAMES,
  type PortalFieldNames
} from "../constants/portal-field-names.js";
import {
  InvalidParameterError,
  type RequestSpecDefaults
} from "../services/cad-calls-request-builder.js";

// ---------------------------------------------------------------------------
// Environment configuration
// ---------------------------------------------------------------------------

export interface CadCallsApiSettings {
  verifySsl: boolean;
  timeoutSeconds: number;
  userAgent: string;
  requestMethod: HttpMethod;
  fallbackOnServerError: boolean;
}

export interface CadCallsConfig {
  baseUrl: string;
  siteName: string;
  endpointPath: string;
  api: CadCallsApiSettings;
  defaults: RequestSpecDefaults;
  outputDirectory: string;
  debugBodyLimit: number;
  fieldNames: PortalFieldNames;
}

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";

export const MAX_TIMEOUT_SECONDS = 2_147_483;

const TRUE_VALUES = ["true", "1", "yes", "y", "on"];
const FALSE_VALUES = ["false", "0", "no", "n", "off"];

const booleanFromEnv = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, context) => {
      const normalized = value?.trim().toLowerCase();
      if (!normalized) {
        return fallback;
      }
      if (TRUE_VALUES.includes(normalized)) {
        return true;
      }
      if (FALSE_VALUES.includes(normalized)) {
        return false;
      }

      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a boolean (true/false), received "${value}"`
      });
      return z.NEVER;
    });

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && !value.trim() ? undefined : value;

const numberFromEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(emptyToUndefined, schema);

const envSchema = z.object({
  CAD_BASE_URL: z
    .string({ required_error: "CAD_BASE_URL is required (e.g. https://southmiamipdfl.policetocitizen.com)" })
    .url("CAD_BASE_URL must be an absolute URL"),
  CAD_AGENCY_ID: numberFromEnv(z.coerce.number().int().positive().optional()),
  CAD_VERIFY_SSL: booleanFromEnv(false),
  CAD_TIMEOUT_SECONDS: numberFromEnv(
    z.coerce
      .number()
      .positive()
      .max(
        MAX_TIMEOUT_SECONDS,
        `CAD_TIMEOUT_SECONDS must be at most ${MAX_TIMEOUT_SECONDS} (timers are limited to 2^31-1 ms)`
      )
      .default(30)
  ),
  CAD_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  CAD_REQUEST_METHOD: z
    .string()
    .default("POST")
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(["POST", "GET"])),
  CAD_FALLBACK_ON_SERVER_ERROR: booleanFromEnv(true),
  CAD_ENDPOINT_PATH: z.string().min(1).default(DEFAULT_ENDPOINT_PATH),
  CAD_OUTPUT_DIR: z.string().min(1).default(DEFAULT_OUTPUT_DIRECTORY),
  CAD_DEBUG_BODY_LIMIT: numberFromEnv(z.coerce.number().int().positive().default(2000)),
  CAD_FIELD_NAMES_PATH: z.string().min(1).optional(),
  CAD_INCLUDE_OPEN: booleanFromEnv(true),
  CAD_INCLUDE_CLOSED: booleanFromEnv(false),
  CAD_TAKE: numberFromEnv(z.coerce.number().int().positive().default(30)),
  CAD_SKIP: numberFromEnv(z.coerce.number().int().nonnegative().default(0)),
  CAD_SEARCH_TEXT: z.string().default("")
});

// ---------------------------------------------------------------------------
// Portal field-name overrides
// ---------------------------------------------------------------------------

const fieldNameOverridesSchema = z
  .object({
    body: z.record(z.string().min(1)).optional(),
    query: z.record(z.string().min(1)).optional(),
    response: z.record(z.string().min(1)).optional(),
    sort: z.record(z.string().min(1)).optional()
  })
  .strict();

const pickKnownKeys = <T extends object>(defaults: T, overrides: Record<string, string> | undefined): T => {
  const merged: T = { ...defaults };
  if (!overrides) {
    return merged;
  }

  for (const key of Object.keys(defaults)) {
    const override = overrides[key];
    if (override !== undefined) {
      Object.assign(merged, { [key]: override });
    }
  }

  return merged;
};

export const loadPortalFieldNames = (filePath: string | undefined): PortalFieldNames => {
  if (!filePath) {
    return DEFAULT_PORTAL_FIELD_NAMES;
  }

  if (!existsSync(filePath)) {
    throw new InvalidParameterError(`Portal field-name file not found: ${filePath}`);
  }

  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new InvalidParameterError(
      `Could not read portal field-name file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidParameterError(
      `Portal field-name file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parseResult = fieldNameOverridesSchema.safeParse(raw);
  if (!parseResult.success) {
    throw new InvalidParameterError(
      `Portal field-name file ${filePath} is invalid: ${parseResult.error.issues.map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`).join("; ")}`
    );
  }

  const overrides = parseResult.data;
  return {
    body: pickKnownKeys(DEFAULT_PORTAL_FIELD_NAMES.body, overrides.body),
    query: pickKnownKeys(DEFAULT_PORTAL_FIELD_NAMES.query, overrides.query),
    response: pickKnownKeys(DEFAULT_PORTAL_FIELD_NAMES.response, overrides.response),
    sort: pickKnownKeys(DEFAULT_PORTAL_FIELD_NAMES.sort, overrides.sort)
  };
};

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * "https://southmiamipdfl.policetocitizen.com" -> "southmiamipdfl"
 */
export const siteNameFromBaseUrl = (baseUrl: string): string => {
  const withoutScheme = baseUrl.replace(/^https?:\/\//i, "");
  const host = withoutScheme.split(/[/:?#]/)[0] ?? "";
  const firstLabel = host.split(".")[0] ?? "";
  const safe = firstLabel.replace(/[^A-Za-z0-9_-]/g, "");
  return safe || "portal";
};

export const loadCadCallsConfig = (env: NodeJS.ProcessEnv = process.env): CadCallsConfig => {
  const parseResult = envSchema.safeParse(env);
  if (!parseResult.success) {
    const { fieldErrors } = parseResult.error.flatten();
    const normalizedErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(fieldErrors)) {
      if (messages?.length) {
        normalizedErrors[field] = messages;
      }
    }

    const summary = Object.entries(normalizedErrors)
      .map(([field, messages]) => `${field}: ${messages.join(", ")}`)
      .join("; ");
    throw new InvalidParameterError(`Invalid configuration: ${summary}`, normalizedErrors);
  }

  const values = parseResult.data;

  return {
    baseUrl: values.CAD_BASE_URL.replace(/\/+$/, ""),
    siteName: siteNameFromBaseUrl(values.CAD_BASE_URL),
    endpointPath: values.CAD_ENDPOINT_PATH,
    api: {
      verifySsl: values.CAD_VERIFY_SSL,
      timeoutSeconds: values.CAD_TIMEOUT_SECONDS,
      userAgent: values.CAD_USER_AGENT,
      requestMethod: values.CAD_REQUEST_METHOD,
      fallbackOnServerError: values.CAD_FALLBACK_ON_SERVER_ERROR
    },
    defaults: {
      agencyId: values.CAD_AGENCY_ID,
      includeOpen: values.CAD_INCLUDE_OPEN,
      includeClosed: values.CAD_INCLUDE_CLOSED,
      take: values.CAD_TAKE,
      skip: values.CAD_SKIP,
      searchText: values.CAD_SEARCH_TEXT,
      transportMethod: values.CAD_REQUEST_METHOD === "GET" ? "FALLBACK" : "PRIMARY"
    },
    outputDirectory: values.CAD_OUTPUT_DIR,
    debugBodyLimit: values.CAD_DEBUG_BODY_LIMIT,
    fieldNames: loadPortalFieldNames(values.CAD_FIELD_NAMES_PATH)
  };
};
