import type { CallRecord, DebugBundle, RequestSpec } from "./contracts.js";

// ---------------------------------------------------------------------------
// Common envelope for pipeline outputs
// ---------------------------------------------------------------------------

export interface PipelineStageOutput<TMetadata, TRecord> {
  stage: string;
  version: number;
  createdAt: string;
  metadata: TMetadata;
  records: TRecord[];
}

// ---------------------------------------------------------------------------
// CAD calls result file
// ---------------------------------------------------------------------------

export interface CadCallsMetadata {
  agencyId: number;
  agencyName: string | null;
  siteName: string;
  retrievedAt: string;
  request: RequestSpec;
  total: number;
  recordCount: number;
}

export const CAD_CALLS_STAGE = "cad-calls";
export const CAD_CALLS_VERSION = 1;

export type CadCallsOutput = PipelineStageOutput<CadCallsMetadata, CallRecord>;

// ---------------------------------------------------------------------------
// Debug bundle file
// ---------------------------------------------------------------------------

export const CAD_CALLS_DEBUG_STAGE = "cad-calls-debug";
export const CAD_CALLS_DEBUG_VERSION = 1;

export interface CadCallsDebugOutput {
  stage: typeof CAD_CALLS_DEBUG_STAGE;
  version: number;
  bundle: DebugBundle;
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export const DEFAULT_OUTPUT_DIRECTORY = "cadcalls_results";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const createStageOutput = <TMetadata, TRecord>(
  stage: string,
  version: number,
  metadata: TMetadata,
  records: TRecord[],
  createdAt: string = new Date().toISOString()
): PipelineStageOutput<TMetadata, TRecord> => ({
  stage,
  version,
  createdAt,
  metadata,
  records
});
