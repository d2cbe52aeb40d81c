import { ShareGateError } from "../lib/errors.js";
import { generateId, nowIso, sha256Hex } from "../lib/ids.js";
import type {
  AuditAction,
  AuditEntry,
  Classification,
  TransmissionRecordJson,
  TransmissionStatus,
} from "../types/transmission.js";

// TRANSMITTED and FAILED are alternative outcomes at the same stage.
const STATUS_RANK: Record<TransmissionStatus, number> = {
  PENDING: 0,
  APPROVED: 1,
  TRANSMITTED: 2,
  FAILED: 2,
  LOGGED: 3,
};

export interface NewTransmissionRecord {
  dataType: string;
  destination: string;
  classification: Classification;
  sizeBytes: number;
}

export class TransmissionRecord {
  readonly id: string;
  readonly dataType: string;
  readonly destination: string;
  readonly classification: Classification;
  readonly sizeBytes: number;
  readonly timestamp: string;
  readonly sovereigntyProtected = true;

  private currentStatus: TransmissionStatus = "PENDING";
  private hash: string | undefined;
  private method: string | undefined;
  private readonly trail: AuditEntry[] = [];

  constructor(input: NewTransmissionRecord) {
    this.id = generateId(24);
    this.dataType = input.dataType;
    this.destination = input.destination;
    this.classification = input.classification;
    this.sizeBytes = input.sizeBytes;
    this.timestamp = nowIso();
  }

  get status(): TransmissionStatus {
    return this.currentStatus;
  }

  get contentHash(): string | undefined {
    return this.hash;
  }

  get encryptionMethod(): string | undefined {
    return this.method;
  }

  get auditTrail(): readonly AuditEntry[] {
    return this.trail;
  }

  addAuditEntry(action: AuditAction, details: string): void {
    this.trail.push(Object.freeze({ timestamp: nowIso(), action, details }));
  }

  setDataHash(data: Uint8Array | string): void {
    this.hash = sha256Hex(data);
    this.addAuditEntry("DATA_HASHED", `SHA-256 hash calculated: ${this.hash.slice(0, 16)}...`);
  }

  setEncryption(method: string): void {
    this.method = method;
    this.addAuditEntry("ENCRYPTED", `Data encrypted using ${method}`);
  }

  /** Only an APPROVED record can be transmitted. */
  markTransmitted(): void {
    if (this.currentStatus !== "APPROVED") {
      throw new ShareGateError(
        "INVALID_TRANSITION",
        `Record ${this.id} cannot move from ${this.currentStatus} to TRANSMITTED.`,
      );
    }
    this.currentStatus = "TRANSMITTED";
    this.addAuditEntry("TRANSMITTED", "Data successfully transmitted to destination");
  }

  markFailed(error: string): void {
    this.transitionTo("FAILED");
    this.addAuditEntry("FAILED", `Transmission failed: ${error}`);
  }

  /** Used by the tracker; APPROVED is only reachable from PENDING. */
  approve(): void {
    if (this.currentStatus === "PENDING") {
      this.currentStatus = "APPROVED";
    }
  }

  /** Used by the tracker; LOGGED is terminal and reachable from any status. */
  markLogged(): void {
    this.currentStatus = "LOGGED";
  }

  toJSON(): TransmissionRecordJson {
    return {
      record_id: this.id,
      data_type: this.dataType,
      destination: this.destination,
      classification: this.classification,
      data_size_bytes: this.sizeBytes,
      timestamp: this.timestamp,
      status: this.currentStatus,
      data_hash: this.hash ?? null,
      encryption_method: this.method ?? null,
      tribal_ip_protected: this.sovereigntyProtected,
      audit_trail: this.trail.map((entry) => ({ ...entry })),
    };
  }

  private transitionTo(next: TransmissionStatus): void {
    if (STATUS_RANK[next] <= STATUS_RANK[this.currentStatus]) {
      throw new ShareGateError(
        "INVALID_TRANSITION",
        `Record ${this.id} cannot move from ${this.currentStatus} to ${next}.`,
      );
    }
    this.currentStatus = next;
  }
}
