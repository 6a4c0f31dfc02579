import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { CallResultSet, DebugBundle } from "../../shared/contracts.js";
import {
  CAD_CALLS_DEBUG_STAGE,
  CAD_CALLS_DEBUG_VERSION,
  CAD_CALLS_STAGE,
  CAD_CALLS_VERSION,
  createStageOutput,
  type CadCallsDebugOutput,
  type CadCallsMetadata,
  type CadCallsOutput
} from "../../shared/pipeline-types.js";
import {
  findPropertyNode,
  parseJsonTree,
  readCallRecords,
  stringifyWithRawRecords
} from "./call-record-json.js";

export interface ArtifactWriteOptions {
  outputDirectory: string;
  /** Used verbatim for the result file instead of a generated name. */
  outputPath?: string | null;
  now?: () => Date;
  log?: (message: string) => void;
}

const MAX_NAME_SUFFIX = 1000;

export const formatFileTimestamp = (date: Date): string =>
  date.toISOString().replace(/[:.]/g, "-");

const ensureDirectory = (filePath: string): void => {
  const directory = dirname(filePath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
};

const isAlreadyExistsError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "EEXIST";

/**
 * Write `contents` to `<directory>/<baseName>.json`, or `<baseName>-<n>.json`
 * when that name is taken. Never overwrites an existing file.
 */
const writeUniqueFile = (directory: string, baseName: string, contents: string): string => {
  mkdirSync(directory, { recursive: true });

  for (let suffix = 0; suffix < MAX_NAME_SUFFIX; suffix += 1) {
    const fileName = suffix === 0 ? `${baseName}.json` : `${baseName}-${suffix}.json`;
    const filePath = join(directory, fileName);
    try {
      writeFileSync(filePath, contents, { encoding: "utf-8", flag: "wx" });
      return filePath;
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw error;
      }
    }
  }

  throw new Error(`Could not find a free file name for ${join(directory, baseName)}.json`);
};

export const buildResultFileName = (resultSet: CallResultSet, timestamp: Date): string =>
  `${resultSet.siteName}_cadcalls_${resultSet.agencyId}_${formatFileTimestamp(timestamp)}`;

export const buildDebugFileName = (bundle: DebugBundle, timestamp: Date): string =>
  `${bundle.siteName}_debug_${bundle.request.agencyId}_${formatFileTimestamp(timestamp)}`;

// ---------------------------------------------------------------------------
// Result file
// ---------------------------------------------------------------------------

export const createResultOutput = (resultSet: CallResultSet, createdAt: string): CadCallsOutput => {
  const metadata: CadCallsMetadata = {
    agencyId: resultSet.agencyId,
    agencyName: resultSet.agencyName,
    siteName: resultSet.siteName,
    retrievedAt: resultSet.retrievedAt,
    request: resultSet.request,
    total: resultSet.total,
    recordCount: resultSet.records.length
  };

  return createStageOutput(
    CAD_CALLS_STAGE,
    CAD_CALLS_VERSION,
    metadata,
    [...resultSet.records],
    createdAt
  );
};

export const writeResultFile = (
  resultSet: CallResultSet,
  options: ArtifactWriteOptions
): string => {
  const now = options.now ?? (() => new Date());
  const createdAt = now();
  const { records, ...envelope } = createResultOutput(resultSet, createdAt.toISOString());
  const contents = stringifyWithRawRecords(envelope, records);

  let filePath: string;
  if (options.outputPath) {
    ensureDirectory(options.outputPath);
    writeFileSync(options.outputPath, contents, "utf-8");
    filePath = options.outputPath;
  } else {
    filePath = writeUniqueFile(
      options.outputDirectory,
      buildResultFileName(resultSet, createdAt),
      contents
    );
  }

  options.log?.(`  Saved ${filePath} (${resultSet.records.length} records)`);
  return filePath;
};

// ---------------------------------------------------------------------------
// Debug bundle
// ---------------------------------------------------------------------------

export const writeDebugBundle = (
  bundle: DebugBundle,
  options: Omit<ArtifactWriteOptions, "outputPath">
): string => {
  const now = options.now ?? (() => new Date());
  const output: CadCallsDebugOutput = {
    stage: CAD_CALLS_DEBUG_STAGE,
    version: CAD_CALLS_DEBUG_VERSION,
    bundle
  };

  const filePath = writeUniqueFile(
    options.outputDirectory,
    buildDebugFileName(bundle, now()),
    JSON.stringify(output, null, 2)
  );

  options.log?.(`  Saved debug bundle ${filePath}`);
  return filePath;
};

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

/**
 * Records come back with the exact JSON text that was written, so a read
 * after a write returns the same `raw` strings.
 */
export const readResultFile = (filePath: string): CadCallsOutput => {
  if (!existsSync(filePath)) {
    throw new Error(`Result file not found: ${filePath}`);
  }

  const text = readFileSync(filePath, "utf-8");
  const raw = JSON.parse(text) as Omit<CadCallsOutput, "records">;

  if (raw.stage !== CAD_CALLS_STAGE) {
    throw new Error(
      `Result file ${filePath} has stage "${raw.stage}" but expected "${CAD_CALLS_STAGE}".`
    );
  }

  if (raw.version !== CAD_CALLS_VERSION) {
    throw new Error(
      `Result file ${filePath} has version ${raw.version} but expected ${CAD_CALLS_VERSION}.`
    );
  }

  const tree = parseJsonTree(text);
  const records = tree.ok
    ? readCallRecords(text, findPropertyNode(tree.root, "records"))
    : { ok: false as const, message: tree.message };
  if (!records.ok) {
    throw new Error(`Result file ${filePath} has unreadable records: ${records.message}`);
  }

  return {
    stage: raw.stage,
    version: raw.version,
    createdAt: raw.createdAt,
    metadata: raw.metadata,
    records: records.records
  };
};

export const readDebugBundle = (filePath: string): CadCallsDebugOutput => {
  if (!existsSync(filePath)) {
    throw new Error(`Debug bundle not found: ${filePath}`);
  }

  const raw = JSON.parse(readFileSync(filePath, "utf-8")) as CadCallsDebugOutput;

  if (raw.stage !== CAD_CALLS_DEBUG_STAGE) {
    throw new Error(
      `Debug bundle ${filePath} has stage "${raw.stage}" but expected "${CAD_CALLS_DEBUG_STAGE}".`
    );
  }

  return raw;
};
