import { isLosslessNumber, stringify } from "lossless-json";
import type { CallRecord, CallResultSet } from "../../shared/contracts.js";

const UNKNOWN = "Unknown";

const displayValue = (value: unknown): string => {
  if (value === undefined || value === null || value === "") {
    return UNKNOWN;
  }
  return typeof value === "string" ? value : stringify(value) ?? UNKNOWN;
};

const isTruthyField = (value: unknown): boolean =>
  isLosslessNumber(value) ? Number(value.value) !== 0 : Boolean(value);

/**
 * "2024-03-01T14:05:09-05:00" -> "2024-03-01 14:05:09"
 */
export const formatCallStartTime = (value: unknown): string => {
  if (typeof value !== "string" || !value.includes("T")) {
    return displayValue(value);
  }

  const [datePart, timePart = ""] = value.split("T");
  const timeWithoutZone = timePart.replace(/(Z|[+-]\d{2}:?\d{2})$/, "");
  return `${datePart} ${timeWithoutZone}`;
};

const formatCall = ({ fields: call }: CallRecord, position: number): string[] => {
  const lines = [
    `Call #${position}:`,
    `  Status: ${displayValue(call.CallType)}`,
    `  Time: ${formatCallStartTime(call.StartTime)}`,
    `  Nature: ${displayValue(call.Nature)}`,
    `  Address: ${displayValue(call.Address)}`,
    `  Agency: ${displayValue(call.Agency)}`,
    `  Incident ID: ${displayValue(call.IncidentId)}`
  ];

  if (isTruthyField(call.HasLocation)) {
    lines.push(`  Location: (${displayValue(call.Latitude)}, ${displayValue(call.Longitude)})`);
  }

  return lines;
};

export const formatCadCalls = (resultSet: CallResultSet): string[] => {
  const lines = [`=== CAD Calls (${resultSet.total} total) ===`, ""];

  if (!resultSet.records.length) {
    lines.push("No calls found matching your criteria.");
    return lines;
  }

  resultSet.records.forEach((call, index) => {
    lines.push(...formatCall(call, index + 1), "");
  });

  return lines;
};
