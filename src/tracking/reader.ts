import fs from "node:fs";

import { ShareGateError } from "../lib/errors.js";
import {
  auditLogExportSchema,
  logEntrySchema,
  type LoggedAuditExport,
  type LoggedEntry,
} from "./schema.js";

function readText(filePath: string): string | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ShareGateError("LOG_READ_FAILED", `Cannot read ${filePath}`, { cause: error });
  }
}

function parseJson(text: string, location: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ShareGateError("LOG_READ_FAILED", `Malformed JSON at ${location}`, { cause: error });
  }
}

/** Returns null when the log does not exist yet. Blank lines are skipped. */
export function readTransmissionLog(logFile: string): LoggedEntry[] | null {
  const text = readText(logFile);
  if (text === null) {
    return null;
  }

  const entries: LoggedEntry[] = [];
  const lines = text.split("\n");
  for (const [index, line] of lines.entries()) {
    if (!line.trim()) {
      continue;
    }

    const location = `${logFile}:${index + 1}`;
    const parsed = logEntrySchema.safeParse(parseJson(line, location));
    if (!parsed.success) {
      throw new ShareGateError(
        "LOG_READ_FAILED",
        `Invalid log entry at ${location}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      );
    }
    entries.push(parsed.data);
  }

  return entries;
}

export function readAuditExport(auditFile: string): LoggedAuditExport | null {
  const text = readText(auditFile);
  if (text === null) {
    return null;
  }

  const parsed = auditLogExportSchema.safeParse(parseJson(text, auditFile));
  if (!parsed.success) {
    throw new ShareGateError(
      "LOG_READ_FAILED",
      `Invalid audit export at ${auditFile}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
    );
  }

  return parsed.data;
}
