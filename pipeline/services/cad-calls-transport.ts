import { Agent, type Dispatcher } from "undici";
import {
  HTTP_METHOD_BY_TRANSPORT,
  type ClassifiedResponse,
  type RawPortalResponse,
  type RequestSpec,
  type TransportAttempt,
  type TransportMethod
} from "../../shared/contracts.js";
import {
  CAD_CALLS_PAGE_PATH,
  DEFAULT_ENDPOINT_PATH,
  DEFAULT_PORTAL_FIELD_NAMES,
  type PortalFieldNames
} from "../constants/portal-field-names.js";
import { classifyResponse, classifyTransportError, formatFailure } from "./cad-calls-classifier.js";
import { buildRequestBody, buildRequestQuery } from "./cad-calls-request-builder.js";

export type PortalRequestInit = RequestInit & { dispatcher?: Dispatcher };

export type PortalFetch = (url: string, init: PortalRequestInit) => Promise<Response>;

export interface CadCallsTransportOptions {
  baseUrl: string;
  endpointPath: string;
  timeoutMs: number;
  verifySsl: boolean;
  userAgent: string;
  fallbackOnServerError: boolean;
  fieldNames: PortalFieldNames;
}

interface CadCallsTransportConstructorOptions
  extends Partial<Omit<CadCallsTransportOptions, "baseUrl">> {
  baseUrl: string;
  fetchImpl?: PortalFetch;
  log?: (message: string) => void;
}

export interface TransportResult {
  attempts: TransportAttempt[];
  finalAttempt: TransportAttempt;
  outcome: ClassifiedResponse;
}

const DEFAULT_OPTIONS: Omit<CadCallsTransportOptions, "baseUrl"> = {
  endpointPath: DEFAULT_ENDPOINT_PATH,
  timeoutMs: 30_000,
  verifySsl: false,
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  fallbackOnServerError: true,
  fieldNames: DEFAULT_PORTAL_FIELD_NAMES
};

const trimTrailingSlash = (value: string): string => value.replace(/\/+$/, "");

const headersToRecord = (headers: Headers): Record<string, string> => {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
};

export class CadCallsTransport {
  private readonly options: CadCallsTransportOptions;

  private readonly fetchImpl: PortalFetch;

  private readonly log: (message: string) => void;

  private insecureDispatcher: Dispatcher | null = null;

  constructor(options: CadCallsTransportConstructorOptions) {
    const { fetchImpl, log, ...transportOptions } = options;
    this.options = { ...DEFAULT_OPTIONS, ...transportOptions };
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
    this.log = log ?? (() => {});
  }

  buildEndpointUrl(agencyId: number): string {
    const path = this.options.endpointPath.replace("{agencyId}", String(agencyId));
    return `${trimTrailingSlash(this.options.baseUrl)}${path.startsWith("/") ? path : `/${path}`}`;
  }

  /**
   * Send one RequestSpec. A primary POST that comes back as HttpError(500) is
   * re-sent once as a GET; nothing is retried beyond that.
   */
  async send(spec: RequestSpec): Promise<TransportResult> {
    const attempts: TransportAttempt[] = [];

    const first = await this.attempt(spec, spec.transportMethod);
    attempts.push(first.attempt);

    const shouldFallBack =
      spec.transportMethod === "PRIMARY" &&
      this.options.fallbackOnServerError &&
      first.outcome.kind === "failure" &&
      first.outcome.failure.kind === "HttpError" &&
      first.outcome.failure.status === 500;

    if (!shouldFallBack) {
      return { attempts, finalAttempt: first.attempt, outcome: first.outcome };
    }

    this.log("[transport] POST returned HTTP 500, retrying once as GET with query parameters");
    const second = await this.attempt(spec, "FALLBACK");
    attempts.push(second.attempt);

    return { attempts, finalAttempt: second.attempt, outcome: second.outcome };
  }

  private async attempt(
    spec: RequestSpec,
    method: TransportMethod
  ): Promise<{ attempt: TransportAttempt; outcome: ClassifiedResponse }> {
    const httpMethod = HTTP_METHOD_BY_TRANSPORT[method];
    const baseUrl = trimTrailingSlash(this.options.baseUrl);
    const endpointUrl = this.buildEndpointUrl(spec.agencyId);

    const requestHeaders: Record<string, string> = {
      "User-Agent": this.options.userAgent,
      Accept: "application/json, text/javascript, */*; q=0.01",
      "Accept-Language": "en-US,en;q=0.9",
      Origin: baseUrl,
      Referer: `${baseUrl}${CAD_CALLS_PAGE_PATH}`,
      "X-Requested-With": "XMLHttpRequest"
    };

    let url = endpointUrl;
    let requestPayload: unknown;
    const init: PortalRequestInit = {
      method: httpMethod,
      headers: requestHeaders,
      signal: AbortSignal.timeout(this.options.timeoutMs)
    };

    if (httpMethod === "POST") {
      requestHeaders["Content-Type"] = "application/json";
      requestPayload = buildRequestBody(spec, this.options.fieldNames);
      init.body = JSON.stringify(requestPayload);
    } else {
      const query = buildRequestQuery(spec, this.options.fieldNames);
      requestPayload = Object.fromEntries(query.entries());
      url = `${endpointUrl}?${query.toString()}`;
    }

    if (!this.options.verifySsl) {
      init.dispatcher = this.getInsecureDispatcher();
    }

    this.log(`[transport] ${httpMethod} ${url}`);

    let response: RawPortalResponse;
    try {
      const fetchResponse = await this.fetchImpl(url, init);
      response = {
        status: fetchResponse.status,
        headers: headersToRecord(fetchResponse.headers),
        body: await fetchResponse.text()
      };
    } catch (error) {
      const { failure, reason } = classifyTransportError(error);
      this.log(`[transport] ${httpMethod} failed: ${formatFailure(failure)} (${reason})`);
      return {
        attempt: { method, httpMethod, url, requestHeaders, requestPayload, response: null, error: reason },
        outcome: { kind: "failure", failure, reason }
      };
    }

    this.log(
      `[transport] HTTP ${response.status} ` +
      `content-type=${response.headers["content-type"] ?? "?"} (${response.body.length} chars)`
    );

    const outcome = classifyResponse(response, this.options.fieldNames.response);

    return {
      attempt: { method, httpMethod, url, requestHeaders, requestPayload, response, error: null },
      outcome
    };
  }

  private getInsecureDispatcher(): Dispatcher {
    if (!this.insecureDispatcher) {
      this.insecureDispatcher = new Agent({ connect: { rejectUnauthorized: false } });
    }
    return this.insecureDispatcher;
  }
}
