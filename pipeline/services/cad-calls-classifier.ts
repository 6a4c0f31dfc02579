import type {
  ClassifiedResponse,
  FailureOutcome,
  RawPortalResponse
} from "../../shared/contracts.js";
import {
  BLOCK_BODY_SIGNATURES,
  BLOCK_HEADER_SIGNATURES
} from "../constants/block-signatures.js";
import type { PortalResponseFieldNames } from "../constants/portal-field-names.js";
import { findPropertyNode, parseJsonTree, readCallRecords } from "../utils/call-record-json.js";

const isObjectRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const failure = (outcome: FailureOutcome, reason: string): ClassifiedResponse => ({
  kind: "failure",
  failure: outcome,
  reason
});

/**
 * Header signatures always apply. Body signatures only apply to bodies that
 * are not JSON, so free text inside a record cannot trip them.
 */
export const findBlockSignature = (response: RawPortalResponse): string | null => {
  for (const signature of BLOCK_HEADER_SIGNATURES) {
    const value = response.headers[signature.header];
    if (value === undefined) {
      continue;
    }

    if (!signature.valuePattern || signature.valuePattern.test(value)) {
      return `${signature.label} (${signature.header}: ${value})`;
    }
  }

  if (parseJsonTree(response.body).ok) {
    return null;
  }

  for (const signature of BLOCK_BODY_SIGNATURES) {
    if (signature.pattern.test(response.body)) {
      return signature.label;
    }
  }

  return null;
};

type ClassificationCheck = (
  response: RawPortalResponse,
  fieldNames: PortalResponseFieldNames
) => ClassifiedResponse | null;

/**
 * Evaluated in order; the first check that returns a result wins. Block
 * signatures sit ahead of the status check so a WAF 403 is reported as
 * Blocked rather than HttpError(403).
 */
const CLASSIFICATION_CHECKS: readonly ClassificationCheck[] = [
  (response) => {
    const signature = findBlockSignature(response);
    return signature
      ? failure({ kind: "Blocked" }, `Response matched bot-detection signature: ${signature}`)
      : null;
  },
  (response) =>
    response.status < 200 || response.status > 299
      ? failure(
          { kind: "HttpError", status: response.status },
          `Portal responded with HTTP ${response.status}`
        )
      : null,
  (response, fieldNames) => {
    const tree = parseJsonTree(response.body);
    if (!tree.ok) {
      return failure(
        { kind: "MalformedResponse" },
        `Response body is not valid JSON: ${tree.message}`
      );
    }

    const { root } = tree;
    const recordsNode = root.type === "array" ? root : findPropertyNode(root, fieldNames.records);
    if (recordsNode?.type !== "array") {
      return failure(
        { kind: "MalformedResponse" },
        `Response JSON has no "${fieldNames.records}" list of records`
      );
    }

    const parsed = readCallRecords(response.body, recordsNode);
    if (!parsed.ok) {
      return failure(
        { kind: "MalformedResponse" },
        `Response "${fieldNames.records}" list is not a list of records: ${parsed.message}`
      );
    }

    const totalNode = findPropertyNode(root, fieldNames.total);
    const total: unknown = totalNode?.type === "number" ? totalNode.value : undefined;
    const { records } = parsed;

    return {
      kind: records.length ? "success" : "empty",
      records,
      total: typeof total === "number" && Number.isFinite(total) ? total : records.length
    };
  }
];

/**
 * Pure function of (status, headers, body). Header names must already be
 * lower-case, as the Fetch API's Headers yields them.
 */
export const classifyResponse = (
  response: RawPortalResponse,
  fieldNames: PortalResponseFieldNames
): ClassifiedResponse => {
  for (const check of CLASSIFICATION_CHECKS) {
    const result = check(response, fieldNames);
    if (result) {
      return result;
    }
  }

  return failure({ kind: "MalformedResponse" }, "Response could not be classified");
};

/**
 * Map an error thrown by fetch (no HTTP response at all).
 */
export const classifyTransportError = (
  error: unknown
): { failure: FailureOutcome; reason: string } => {
  const name = error instanceof Error ? error.name : "";
  const message = error instanceof Error ? error.message : String(error);

  if (name === "TimeoutError" || name === "AbortError") {
    return { failure: { kind: "Timeout" }, reason: `No response before timeout: ${message}` };
  }

  const cause = error instanceof Error && isObjectRecord(error.cause) ? error.cause : null;
  const causeCode = cause && typeof cause.code === "string" ? cause.code : null;
  if (causeCode === "UND_ERR_CONNECT_TIMEOUT" || causeCode === "UND_ERR_HEADERS_TIMEOUT") {
    return { failure: { kind: "Timeout" }, reason: `No response before timeout: ${causeCode}` };
  }

  return {
    failure: { kind: "ConnectionError" },
    reason: causeCode ? `${message} (${causeCode})` : message
  };
};

export const formatFailure = (outcome: FailureOutcome): string =>
  outcome.kind === "HttpError" ? `HttpError(${outcome.status})` : outcome.kind;

/**
 * User-facing advice for a failure. Blocked and Timeout get specific
 * remediation hints; everything else reports the raw reason.
 */
export const describeFailure = (outcome: FailureOutcome, reason: string): string => {
  switch (outcome.kind) {
    case "Blocked":
      return (
        `Request was blocked by the portal's bot protection (${reason}). ` +
        "Direct API access does not work for this deployment; use the portal in a browser instead."
      );
    case "Timeout":
      return `${reason}. Try increasing CAD_TIMEOUT_SECONDS.`;
    case "HttpError":
      return `Request failed with HTTP ${outcome.status}: ${reason}`;
    case "ConnectionError":
      return `Could not connect to the portal: ${reason}`;
    case "MalformedResponse":
      return `Portal returned an unexpected response: ${reason}`;
  }
};
