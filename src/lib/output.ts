import type { FullResults, ShareableResults } from "../assessment/assessment.js";
import type { LoggedAuditExport, LoggedRecord } from "../tracking/schema.js";
import type {
  Classification,
  TransmissionStatus,
  TransmissionSummary,
} from "../types/transmission.js";

export interface WorkflowTransmission {
  recordId: string;
  dataType: string;
  findingsCount: number;
  dataHash: string | null;
  outcome: TransmissionStatus;
  status: TransmissionStatus;
  reason?: string;
  transmissionId?: string;
  receiptId?: string;
}

export interface WorkflowReport {
  command: string;
  configPath?: string;
  logDir: string;
  destination: string;
  classification: Classification;
  totalAssessments: number;
  totalFindings: number;
  transmissions: WorkflowTransmission[];
  summary: TransmissionSummary;
  logFile: string;
  summaryFile: string;
  auditFile: string;
  note: string;
}

export interface AssessReport {
  command: string;
  view: "shareable" | "internal";
  configPath?: string;
  assessments: Array<ShareableResults | FullResults>;
}

export interface DashboardReport {
  command: string;
  logFile: string;
  source: string;
  totalTransmissions: number;
  totalBytes: number;
  transmissions: LoggedRecord[];
  audit?: LoggedAuditExport | null;
}

function formatBreakdown(breakdown: Record<string, number | undefined>): string {
  const parts = Object.entries(breakdown).map(([key, count]) => `${key}=${count ?? 0}`);
  return parts.length > 0 ? parts.join(", ") : "none";
}

export function printJson(report: WorkflowReport | AssessReport | DashboardReport): void {
  console.log(JSON.stringify(report, null, 2));
}

export function printHumanWorkflowReport(report: WorkflowReport): void {
  console.log(`Command: ${report.command}`);
  if (report.configPath) {
    console.log(`Config: ${report.configPath}`);
  }
  console.log(`Destination: ${report.destination}`);
  console.log(`Classification: ${report.classification}`);
  console.log(`Assessments: ${report.totalAssessments}`);
  console.log(`Shareable Findings: ${report.totalFindings}`);

  console.log("Transmissions:");
  for (const transmission of report.transmissions) {
    const hashText = transmission.dataHash ? ` hash ${transmission.dataHash.slice(0, 16)}...` : "";
    console.log(
      `- ${transmission.recordId} [${transmission.outcome}] ${transmission.dataType} (${transmission.findingsCount} findings)${hashText}`,
    );
    if (transmission.reason) {
      console.log(`  Reason: ${transmission.reason}`);
    }
    if (transmission.transmissionId && transmission.receiptId) {
      console.log(`  Transmission: ${transmission.transmissionId} receipt ${transmission.receiptId}`);
    }
  }

  console.log(`Status Breakdown: ${formatBreakdown(report.summary.status_breakdown)}`);
  console.log(`Log File: ${report.logFile}`);
  console.log(`Summary File: ${report.summaryFile}`);
  console.log(`Audit Export: ${report.auditFile}`);
  console.log(`Note: ${report.note}`);
}

export function printHumanAssessReport(report: AssessReport): void {
  console.log(`Command: ${report.command}`);
  console.log(`View: ${report.view}`);
  if (report.configPath) {
    console.log(`Config: ${report.configPath}`);
  }

  for (const assessment of report.assessments) {
    console.log(`Assessment: ${assessment.name} (${assessment.assessment_id})`);
    console.log(`  Type: ${assessment.assessment_type}`);
    console.log(`  Findings: ${assessment.findings_count}`);
    console.log(`  Severity: ${formatBreakdown(assessment.severity_summary)}`);
    for (const finding of assessment.findings) {
      console.log(`  - [${finding.severity}/${finding.protection_level}] ${finding.description}`);
    }
  }
}

export function printHumanDashboardReport(report: DashboardReport): void {
  console.log("Partner Assessment Dashboard");
  console.log(`Source: ${report.source}`);
  console.log(`Log File: ${report.logFile}`);
  console.log(`Total Data Transmissions: ${report.totalTransmissions}`);

  for (const record of report.transmissions) {
    console.log(`Transmission ID: ${record.record_id}`);
    console.log(`  Type: ${record.data_type}`);
    console.log(`  Classification: ${record.classification}`);
    console.log(`  Encryption: ${record.encryption_method ?? "N/A"}`);
    console.log(`  Timestamp: ${record.timestamp}`);
    console.log(`  Status: ${record.status}`);
    console.log(`  Data Hash: ${record.data_hash ? `${record.data_hash.slice(0, 32)}...` : "N/A"}`);
  }

  console.log(`Total Data Transferred: ${report.totalBytes.toLocaleString("en-US")} bytes`);

  if (report.audit === undefined) {
    return;
  }

  if (report.audit === null) {
    console.log("Audit Trail: no audit export found");
    return;
  }

  const { summary } = report.audit;
  console.log(`Audit Export: ${report.audit.export_timestamp}`);
  console.log(`  Total Transmissions: ${summary.total_transmissions}`);
  console.log(`  Status Breakdown: ${formatBreakdown(summary.status_breakdown)}`);
  console.log(`  Classifications: ${formatBreakdown(summary.classification_breakdown)}`);
  console.log(`  Destinations: ${formatBreakdown(summary.destination_breakdown)}`);

  for (const [index, record] of report.audit.records.entries()) {
    console.log(`Record ${index + 1}: ${record.record_id} (${record.data_type}, ${record.classification})`);
    for (const entry of record.audit_trail) {
      console.log(`  - [${entry.timestamp}] ${entry.action}: ${entry.details}`);
    }
  }
}
