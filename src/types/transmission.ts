export const CLASSIFICATIONS = ["PUBLIC", "SENSITIVE", "CONFIDENTIAL", "TRIBAL_SOVEREIGN"] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

export const TRANSMISSION_STATUSES = [
  "PENDING",
  "APPROVED",
  "TRANSMITTED",
  "FAILED",
  "LOGGED",
] as const;

export type TransmissionStatus = (typeof TRANSMISSION_STATUSES)[number];

export type AuditAction =
  | "CREATED"
  | "DATA_HASHED"
  | "ENCRYPTED"
  | "VALIDATION_PASSED"
  | "VALIDATION_FAILED"
  | "TRANSMITTED"
  | "FAILED"
  | "LOGGED";

export interface AuditEntry {
  readonly timestamp: string;
  readonly action: AuditAction;
  readonly details: string;
}

/** Snake-case form written to the transmission log and snapshot files. */
export interface TransmissionRecordJson {
  record_id: string;
  data_type: string;
  destination: string;
  classification: Classification;
  data_size_bytes: number;
  timestamp: string;
  status: TransmissionStatus;
  data_hash: string | null;
  encryption_method: string | null;
  tribal_ip_protected: boolean;
  audit_trail: AuditEntry[];
}

export interface TransmissionLogEntry {
  log_timestamp: string;
  record: TransmissionRecordJson;
}

export interface TransmissionSummary {
  total_transmissions: number;
  status_breakdown: Partial<Record<TransmissionStatus, number>>;
  classification_breakdown: Partial<Record<Classification, number>>;
  destination_breakdown: Record<string, number>;
  log_file: string;
}

export interface AuditLogExport {
  export_timestamp: string;
  summary: TransmissionSummary;
  records: TransmissionRecordJson[];
}
