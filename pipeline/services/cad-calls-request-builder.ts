import { z } from "zod";
import type { RequestSpec, TransportMethod } from "../../shared/contracts.js";
import type { PortalFieldNames } from "../constants/portal-field-names.js";

export class InvalidParameterError extends Error {
  readonly fieldErrors: Record<string, string[]>;

  constructor(message: string, fieldErrors: Record<string, string[]> = {}) {
    super(message);
    this.name = "InvalidParameterError";
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Values as they arrive from the CLI or config: numbers may still be strings.
 */
export interface RequestSpecInput {
  agencyId?: number | string;
  includeOpen?: boolean;
  includeClosed?: boolean;
  take?: number | string;
  skip?: number | string;
  searchText?: string;
  transportMethod?: TransportMethod;
}

export type RequestSpecDefaults = Omit<RequestSpec, "agencyId" | "transportMethod"> &
  Partial<Pick<RequestSpec, "agencyId" | "transportMethod">>;

const requestSpecSchema = z.object({
  agencyId: z.coerce
    .number({ invalid_type_error: "agencyId must be a number" })
    .int("agencyId must be an integer")
    .positive("agencyId must be positive"),
  includeOpen: z.boolean(),
  includeClosed: z.boolean(),
  take: z.coerce
    .number({ invalid_type_error: "take must be a number" })
    .int("take must be an integer")
    .positive("take must be positive"),
  skip: z.coerce
    .number({ invalid_type_error: "skip must be a number" })
    .int("skip must be an integer")
    .nonnegative("skip must not be negative"),
  searchText: z.string(),
  transportMethod: z.enum(["PRIMARY", "FALLBACK"])
});

const formatFieldErrors = (fieldErrors: Record<string, string[]>): string =>
  Object.entries(fieldErrors)
    .map(([field, messages]) => `${field}: ${messages.join(", ")}`)
    .join("; ");

const firstDefined = <T>(...values: (T | undefined)[]): T | undefined =>
  values.find((value) => value !== undefined);

/**
 * Resolve CLI/config input into a frozen RequestSpec. Throws
 * InvalidParameterError without touching the network.
 *
 * Both open/closed flags false is a valid request; the portal decides what
 * that means.
 */
export const buildRequestSpec = (
  input: RequestSpecInput,
  defaults?: RequestSpecDefaults
): RequestSpec => {
  const candidate = {
    agencyId: firstDefined(input.agencyId, defaults?.agencyId),
    includeOpen: firstDefined(input.includeOpen, defaults?.includeOpen),
    includeClosed: firstDefined(input.includeClosed, defaults?.includeClosed),
    take: firstDefined(input.take, defaults?.take),
    skip: firstDefined(input.skip, defaults?.skip, 0),
    searchText: firstDefined(input.searchText, defaults?.searchText, ""),
    transportMethod: firstDefined<TransportMethod>(
      input.transportMethod,
      defaults?.transportMethod,
      "PRIMARY"
    )
  };

  // z.coerce turns "" and undefined into 0 / NaN; catch missing values first
  // so the message names the real problem.
  const missingFieldErrors: Record<string, string[]> = {};
  for (const field of ["agencyId", "take"] as const) {
    const value = candidate[field];
    if (value === undefined || (typeof value === "string" && !value.trim())) {
      missingFieldErrors[field] = [`${field} is required`];
    }
  }
  for (const field of ["includeOpen", "includeClosed"] as const) {
    if (candidate[field] === undefined) {
      missingFieldErrors[field] = [`${field} is required`];
    }
  }
  if (Object.keys(missingFieldErrors).length) {
    throw new InvalidParameterError(
      `Invalid request parameters: ${formatFieldErrors(missingFieldErrors)}`,
      missingFieldErrors
    );
  }

  const parseResult = requestSpecSchema.safeParse(candidate);
  if (!parseResult.success) {
    const { fieldErrors } = parseResult.error.flatten();
    const normalizedErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(fieldErrors)) {
      if (messages?.length) {
        normalizedErrors[field] = messages;
      }
    }

    throw new InvalidParameterError(
      `Invalid request parameters: ${formatFieldErrors(normalizedErrors)}`,
      normalizedErrors
    );
  }

  return Object.freeze({ ...parseResult.data });
};

// ---------------------------------------------------------------------------
// Wire encodings
// ---------------------------------------------------------------------------

/**
 * JSON body for the primary POST attempt.
 */
export const buildRequestBody = (
  spec: RequestSpec,
  fieldNames: PortalFieldNames
): Record<string, unknown> => {
  const { body, sort } = fieldNames;

  return {
    [body.includeOpen]: spec.includeOpen,
    [body.includeClosed]: spec.includeClosed,
    [body.includeCount]: true,
    [body.pagingOptions]: {
      [body.sortOptions]: [
        {
          [body.sortName]: sort.field,
          [body.sortDirection]: sort.direction,
          [body.sortSequence]: 1
        }
      ],
      [body.take]: spec.take,
      [body.skip]: spec.skip
    },
    [body.filterOptions]: {
      [body.intersectionSearch]: true,
      [body.searchText]: spec.searchText,
      // Portal answers 500 when search text is also sent as a parameter.
      [body.filterParameters]: []
    }
  };
};

/**
 * Query string for the GET fallback. Booleans go over the wire lower-case.
 */
export const buildRequestQuery = (
  spec: RequestSpec,
  fieldNames: PortalFieldNames
): URLSearchParams => {
  const { query } = fieldNames;

  return new URLSearchParams({
    [query.includeOpen]: String(spec.includeOpen),
    [query.includeClosed]: String(spec.includeClosed),
    [query.take]: String(spec.take),
    [query.skip]: String(spec.skip),
    [query.searchText]: spec.searchText
  });
};
