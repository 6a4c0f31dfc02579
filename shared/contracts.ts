// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

export type TransportMethod = "PRIMARY" | "FALLBACK";

export type HttpMethod = "POST" | "GET";

export const HTTP_METHOD_BY_TRANSPORT: Record<TransportMethod, HttpMethod> = {
  PRIMARY: "POST",
  FALLBACK: "GET"
};

export interface RequestSpec {
  readonly agencyId: number;
  readonly includeOpen: boolean;
  readonly includeClosed: boolean;
  readonly take: number;
  readonly skip: number;
  readonly searchText: string;
  readonly transportMethod: TransportMethod;
}

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

/**
 * One dispatch event exactly as the portal returned it. Different portal
 * deployments return different field sets, so no schema is imposed here.
 * `raw` is the record's JSON text as received; `fields` is a parsed view of
 * it whose numbers are lossless-json LosslessNumber values.
 */
export interface CallRecord {
  readonly raw: string;
  readonly fields: Readonly<Record<string, unknown>>;
}

export interface CallResultSet {
  readonly request: RequestSpec;
  readonly retrievedAt: string;
  readonly agencyId: number;
  readonly agencyName: string | null;
  readonly siteName: string;
  readonly total: number;
  readonly records: readonly CallRecord[];
}

export type FailureOutcome =
  | { kind: "Timeout" }
  | { kind: "ConnectionError" }
  | { kind: "HttpError"; status: number }
  | { kind: "MalformedResponse" }
  | { kind: "Blocked" };

export type FailureKind = FailureOutcome["kind"];

export interface RawPortalResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type ClassifiedResponse =
  | {
      kind: "success";
      records: CallRecord[];
      total: number;
    }
  | {
      kind: "empty";
      records: CallRecord[];
      total: number;
    }
  | {
      kind: "failure";
      failure: FailureOutcome;
      reason: string;
    };

// ---------------------------------------------------------------------------
// Transport attempts + debug bundle
// ---------------------------------------------------------------------------

export interface TransportAttempt {
  method: TransportMethod;
  httpMethod: HttpMethod;
  url: string;
  requestHeaders: Record<string, string>;
  requestPayload: unknown;
  /** null when no HTTP response was received (timeout, connection error) */
  response: RawPortalResponse | null;
  error: string | null;
}

export interface DebugBundleAttemptSummary {
  method: TransportMethod;
  httpMethod: HttpMethod;
  url: string;
  status: number | null;
  error: string | null;
}

export interface DebugBundle {
  readonly createdAt: string;
  readonly request: RequestSpec;
  readonly siteName: string;
  readonly transportMethod: TransportMethod;
  readonly httpMethod: HttpMethod;
  readonly url: string;
  readonly status: number | null;
  readonly failure: FailureOutcome;
  readonly reason: string;
  readonly requestHeaders: Record<string, string>;
  readonly requestPayload: unknown;
  readonly responseHeaders: Record<string, string>;
  readonly body: string;
  readonly bodyLength: number;
  readonly bodyTruncated: boolean;
  readonly attempts: readonly DebugBundleAttemptSummary[];
}
