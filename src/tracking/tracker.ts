import fs from "node:fs";
import path from "node:path";

import { ShareGateError } from "../lib/errors.js";
import { nowIso } from "../lib/ids.js";
import type {
  AuditLogExport,
  TransmissionLogEntry,
  TransmissionSummary,
} from "../types/transmission.js";
import { TransmissionRecord, type NewTransmissionRecord } from "./record.js";

export const TRANSMISSION_LOG_FILE = "tribal_data_transmission_log.jsonl";
export const SUMMARY_FILE = "transmission_summary.json";
export const AUDIT_EXPORT_FILE = "complete_audit_log.json";

export function recordSnapshotPath(logDirectory: string, recordId: string): string {
  return path.join(logDirectory, `transmission_${recordId}.json`);
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function writeFile(filePath: string, write: () => void): void {
  try {
    write();
  } catch (error) {
    throw new ShareGateError("LOG_WRITE_FAILED", `Failed to write ${filePath}`, { cause: error });
  }
}

export class TransmissionTracker {
  readonly logDirectory: string;
  readonly mainLogFile: string;
  private readonly recordList: TransmissionRecord[] = [];

  constructor(logDirectory = "./logs") {
    this.logDirectory = path.resolve(logDirectory);
    this.mainLogFile = path.join(this.logDirectory, TRANSMISSION_LOG_FILE);
    writeFile(this.logDirectory, () => fs.mkdirSync(this.logDirectory, { recursive: true }));
  }

  get records(): readonly TransmissionRecord[] {
    return this.recordList;
  }

  createTransmissionRecord(input: NewTransmissionRecord): TransmissionRecord {
    const record = new TransmissionRecord(input);
    this.recordList.push(record);
    record.addAuditEntry("CREATED", "Transmission record created");
    return record;
  }

  /**
   * Checks run in a fixed order and the first failure wins. Exactly one audit
   * entry is appended per call; a failed check leaves the status as it was.
   */
  validateTransmission(record: TransmissionRecord): boolean {
    if (record.classification === "TRIBAL_SOVEREIGN") {
      record.addAuditEntry("VALIDATION_FAILED", "TRIBAL_SOVEREIGN data cannot leave network");
      return false;
    }

    if (!record.encryptionMethod) {
      record.addAuditEntry("VALIDATION_FAILED", "No encryption method specified");
      return false;
    }

    if (!record.contentHash) {
      record.addAuditEntry("VALIDATION_FAILED", "Data hash not calculated");
      return false;
    }

    record.addAuditEntry("VALIDATION_PASSED", "All validation checks passed");
    record.approve();
    return true;
  }

  /**
   * Overwrites the record's snapshot file, then appends it to the shared
   * JSONL log. The status becomes LOGGED whatever the validation outcome was.
   * A LOG_WRITE_FAILED from the append leaves the snapshot behind but never
   * a log line for a record that is not LOGGED.
   */
  logTransmission(record: TransmissionRecord): void {
    const snapshot = record.toJSON();
    const entry: TransmissionLogEntry = {
      log_timestamp: nowIso(),
      record: snapshot,
    };

    const recordFile = recordSnapshotPath(this.logDirectory, record.id);
    writeFile(recordFile, () =>
      fs.writeFileSync(recordFile, JSON.stringify(snapshot, null, 2), "utf8"),
    );

    writeFile(this.mainLogFile, () =>
      fs.appendFileSync(this.mainLogFile, `${JSON.stringify(entry)}\n`, "utf8"),
    );

    record.markLogged();
    record.addAuditEntry("LOGGED", `Record logged to ${this.mainLogFile}`);
  }

  getTransmissionSummary(): TransmissionSummary {
    const summary: TransmissionSummary = {
      total_transmissions: this.recordList.length,
      status_breakdown: {},
      classification_breakdown: {},
      destination_breakdown: {},
      log_file: this.mainLogFile,
    };

    for (const record of this.recordList) {
      increment(summary.status_breakdown, record.status);
      increment(summary.classification_breakdown, record.classification);
      increment(summary.destination_breakdown, record.destination);
    }

    return summary;
  }

  getRecordsByDestination(destination: string): TransmissionRecord[] {
    return this.recordList.filter((record) => record.destination === destination);
  }

  writeSummary(outputFile: string): string {
    const summary = this.getTransmissionSummary();
    writeFile(outputFile, () =>
      fs.writeFileSync(outputFile, JSON.stringify(summary, null, 2), "utf8"),
    );
    return outputFile;
  }

  exportAuditLog(outputFile: string): string {
    const audit: AuditLogExport = {
      export_timestamp: nowIso(),
      summary: this.getTransmissionSummary(),
      records: this.recordList.map((record) => record.toJSON()),
    };
    writeFile(outputFile, () =>
      fs.writeFileSync(outputFile, JSON.stringify(audit, null, 2), "utf8"),
    );
    return outputFile;
  }
}
