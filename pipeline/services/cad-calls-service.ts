import type {
  CallRecord,
  CallResultSet,
  ClassifiedResponse,
  DebugBundle,
  FailureOutcome,
  RequestSpec
} from "../../shared/contracts.js";
import type { PortalResponseFieldNames } from "../constants/portal-field-names.js";
import type { CadCallsConfig } from "../scripts/pipeline-config.js";
import { writeDebugBundle, writeResultFile } from "../utils/pipeline-io.js";
import { describeFailure, formatFailure } from "./cad-calls-classifier.js";
import {
  buildRequestSpec,
  InvalidParameterError,
  type RequestSpecInput
} from "./cad-calls-request-builder.js";
import { CadCallsTransport, type PortalFetch, type TransportResult } from "./cad-calls-transport.js";

export const EXIT_CODES = {
  success: 0,
  requestFailed: 1,
  invalidParameters: 2,
  ioError: 3,
  internalError: 4
} as const;

export type CadCallsExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CadCallsInvocation extends RequestSpecInput {
  outputPath?: string | null;
  outputDirectory?: string | null;
}

export interface CadCallsRunOptions {
  config: CadCallsConfig;
  fetchImpl?: PortalFetch;
  now?: () => Date;
  log?: (message: string) => void;
  logError?: (message: string) => void;
}

export type CadCallsRunResult =
  | {
      exitCode: typeof EXIT_CODES.success;
      status: "success";
      spec: RequestSpec;
      resultSet: CallResultSet;
      artifactPath: string;
    }
  | {
      exitCode: typeof EXIT_CODES.requestFailed;
      status: "failure";
      spec: RequestSpec;
      failure: FailureOutcome;
      message: string;
      artifactPath: string;
    }
  | {
      exitCode: typeof EXIT_CODES.invalidParameters;
      status: "invalid-parameters";
      message: string;
    }
  | {
      exitCode: typeof EXIT_CODES.ioError;
      status: "io-error";
      message: string;
    };

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

const findAgencyName = (
  records: readonly CallRecord[],
  fieldNames: PortalResponseFieldNames
): string | null => {
  for (const record of records) {
    const value = record.fields[fieldNames.agencyName];
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }
  return null;
};

export const buildCallResultSet = (
  spec: RequestSpec,
  outcome: Extract<ClassifiedResponse, { kind: "success" | "empty" }>,
  options: { siteName: string; fieldNames: PortalResponseFieldNames; retrievedAt: Date }
): CallResultSet =>
  Object.freeze({
    request: spec,
    retrievedAt: options.retrievedAt.toISOString(),
    agencyId: spec.agencyId,
    agencyName: findAgencyName(outcome.records, options.fieldNames),
    siteName: options.siteName,
    total: outcome.total,
    records: Object.freeze([...outcome.records])
  });

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

/**
 * Cut `body` to at most `limit` UTF-16 units without splitting a surrogate
 * pair.
 */
const truncateBody = (body: string, limit: number): string => {
  if (body.length <= limit) {
    return body;
  }

  const end = limit > 0 && isHighSurrogate(body.charCodeAt(limit - 1)) ? limit - 1 : limit;
  return body.slice(0, end);
};

export const buildDebugBundle = (
  spec: RequestSpec,
  transportResult: TransportResult,
  failure: FailureOutcome,
  reason: string,
  options: { siteName: string; bodyLimit: number; createdAt: Date }
): DebugBundle => {
  const { finalAttempt } = transportResult;
  const rawBody = finalAttempt.response?.body ?? "";
  const bodyTruncated = rawBody.length > options.bodyLimit;

  return Object.freeze({
    createdAt: options.createdAt.toISOString(),
    request: spec,
    siteName: options.siteName,
    transportMethod: finalAttempt.method,
    httpMethod: finalAttempt.httpMethod,
    url: finalAttempt.url,
    status: finalAttempt.response?.status ?? null,
    failure,
    reason,
    requestHeaders: finalAttempt.requestHeaders,
    requestPayload: finalAttempt.requestPayload,
    responseHeaders: finalAttempt.response?.headers ?? {},
    body: truncateBody(rawBody, options.bodyLimit),
    bodyLength: rawBody.length,
    bodyTruncated,
    attempts: transportResult.attempts.map((attempt) => ({
      method: attempt.method,
      httpMethod: attempt.httpMethod,
      url: attempt.url,
      status: attempt.response?.status ?? null,
      error: attempt.error
    }))
  });
};

// ---------------------------------------------------------------------------
// Single run
// ---------------------------------------------------------------------------

/**
 * One pass: build the request, send it (plus at most one fallback), then
 * write exactly one artifact. Invalid parameters stop before any network
 * I/O and write nothing.
 */
export const runCadCallsFetch = async (
  invocation: CadCallsInvocation,
  options: CadCallsRunOptions
): Promise<CadCallsRunResult> => {
  const { config } = options;
  const now = options.now ?? (() => new Date());
  const log = options.log ?? (() => {});
  const logError = options.logError ?? ((message: string) => console.error(message));
  const outputDirectory = invocation.outputDirectory || config.outputDirectory;

  let spec: RequestSpec;
  try {
    spec = buildRequestSpec(invocation, config.defaults);
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      logError(`[cad-calls] ${error.message}`);
      return { exitCode: EXIT_CODES.invalidParameters, status: "invalid-parameters", message: error.message };
    }
    throw error;
  }

  log(`[cad-calls] Fetching calls for agency ${spec.agencyId} from ${config.baseUrl}`);
  log(
    `[cad-calls] open=${spec.includeOpen} closed=${spec.includeClosed} ` +
    `take=${spec.take} skip=${spec.skip} search="${spec.searchText}" method=${spec.transportMethod}`
  );

  const transport = new CadCallsTransport({
    baseUrl: config.baseUrl,
    endpointPath: config.endpointPath,
    timeoutMs: config.api.timeoutSeconds * 1000,
    verifySsl: config.api.verifySsl,
    userAgent: config.api.userAgent,
    fallbackOnServerError: config.api.fallbackOnServerError,
    fieldNames: config.fieldNames,
    fetchImpl: options.fetchImpl,
    log
  });

  const transportResult = await transport.send(spec);
  const { outcome } = transportResult;

  try {
    if (outcome.kind !== "failure") {
      const resultSet = buildCallResultSet(spec, outcome, {
        siteName: config.siteName,
        fieldNames: config.fieldNames.response,
        retrievedAt: now()
      });

      const artifactPath = writeResultFile(resultSet, {
        outputDirectory,
        outputPath: invocation.outputPath,
        now,
        log
      });

      log(`[cad-calls] Retrieved ${resultSet.records.length} of ${resultSet.total} call(s)`);
      return { exitCode: EXIT_CODES.success, status: "success", spec, resultSet, artifactPath };
    }

    const bundle = buildDebugBundle(spec, transportResult, outcome.failure, outcome.reason, {
      siteName: config.siteName,
      bodyLimit: config.debugBodyLimit,
      createdAt: now()
    });

    const artifactPath = writeDebugBundle(bundle, { outputDirectory, now, log });
    const message = describeFailure(outcome.failure, outcome.reason);

    logError(`[cad-calls] ${formatFailure(outcome.failure)}: ${message}`);
    logError(`[cad-calls] Debug bundle: ${artifactPath}`);

    return {
      exitCode: EXIT_CODES.requestFailed,
      status: "failure",
      spec,
      failure: outcome.failure,
      message,
      artifactPath
    };
  } catch (error) {
    const message = `Could not write output file: ${errorMessage(error)}`;
    logError(`[cad-calls] ${message}`);
    return { exitCode: EXIT_CODES.ioError, status: "io-error", message };
  }
};
