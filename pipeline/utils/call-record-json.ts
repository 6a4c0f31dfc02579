import jsoncParser from "jsonc-parser";
import type { Node, ParseError } from "jsonc-parser";
import { parse as parseLossless } from "lossless-json";
import type { CallRecord } from "../../shared/contracts.js";

// jsonc-parser ships a UMD build without an ESM entry, so Node only exposes
// its exports through the default import.
const { findNodeAtLocation, parseTree, printParseErrorCode } = jsoncParser;

export type JsonTreeResult = { ok: true; root: Node } | { ok: false; message: string };

export type CallRecordsResult =
  | { ok: true; records: CallRecord[] }
  | { ok: false; message: string };

const isObjectRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Strict JSON (no comments, no trailing commas) parsed into a syntax tree
 * whose nodes carry offsets back into `text`.
 */
export const parseJsonTree = (text: string): JsonTreeResult => {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, {
    disallowComments: true,
    allowTrailingComma: false,
    allowEmptyContent: false
  });

  const [firstError] = errors;
  if (firstError) {
    return {
      ok: false,
      message: `${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`
    };
  }

  return root ? { ok: true, root } : { ok: false, message: "empty document" };
};

export const findPropertyNode = (root: Node, key: string): Node | undefined =>
  root.type === "object" ? findNodeAtLocation(root, [key]) : undefined;

export const nodeText = (text: string, node: Node): string =>
  text.slice(node.offset, node.offset + node.length);

/**
 * `raw` must be one JSON object. Numbers in `fields` stay LosslessNumber so
 * no digits are lost.
 */
export const parseCallRecord = (
  raw: string
): { ok: true; record: CallRecord } | { ok: false; message: string } => {
  let fields: unknown;
  try {
    fields = parseLossless(raw);
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }

  if (!isObjectRecord(fields)) {
    return { ok: false, message: "not a JSON object" };
  }

  return { ok: true, record: Object.freeze({ raw, fields: Object.freeze(fields) }) };
};

export const readCallRecords = (text: string, node: Node | undefined): CallRecordsResult => {
  if (!node || node.type !== "array") {
    return { ok: false, message: "not a list" };
  }

  const records: CallRecord[] = [];
  for (const [index, child] of (node.children ?? []).entries()) {
    if (child.type !== "object") {
      return { ok: false, message: `entry ${index} is a ${child.type}, not an object` };
    }

    const parsed = parseCallRecord(nodeText(text, child));
    if (!parsed.ok) {
      return { ok: false, message: `entry ${index}: ${parsed.message}` };
    }
    records.push(parsed.record);
  }

  return { ok: true, records };
};

/**
 * Pretty-print `envelope` and append `records` as their original JSON text,
 * so key order and number formatting survive the write.
 */
export const stringifyWithRawRecords = (
  envelope: object,
  records: readonly CallRecord[]
): string => {
  const head = Object.keys(envelope).length
    ? `${JSON.stringify(envelope, null, 2).replace(/\n}$/, "")},`
    : "{";
  const recordsText = records.length
    ? `[\n${records.map((record) => `    ${record.raw}`).join(",\n")}\n  ]`
    : "[]";
  return `${head}\n  "records": ${recordsText}\n}\n`;
};
