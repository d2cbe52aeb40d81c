import path from "node:path";

import { z } from "zod";

import type { ShareableResults } from "../assessment/assessment.js";
import { AssessmentSystem } from "../assessment/system.js";
import { classificationSchema, loadShareGateConfig, type ShareGateConfig } from "../config/load.js";
import { parseCliOptions } from "../lib/options.js";
import {
  printHumanWorkflowReport,
  printJson,
  type WorkflowReport,
  type WorkflowTransmission,
} from "../lib/output.js";
import type { TransmissionRecord } from "../tracking/record.js";
import { AUDIT_EXPORT_FILE, SUMMARY_FILE, TransmissionTracker } from "../tracking/tracker.js";
import { PartnerIntegration } from "../transmission/integration.js";
import {
  DEFAULT_DESTINATION,
  DEFAULT_ENDPOINT,
  DEFAULT_SOURCE,
  SecureTransmitter,
  serializePayload,
  type TransmissionPackage,
} from "../transmission/transmitter.js";

const cliRunOptionsSchema = z.object({
  config: z.string().optional(),
  json: z.boolean().optional(),
  logDir: z.string().min(1).optional(),
  classification: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(classificationSchema)
    .optional(),
  destination: z.string().min(1).optional(),
});

const effectiveRunOptionsSchema = z.object({
  json: z.boolean(),
  logDir: z.string().min(1),
  classification: classificationSchema,
  destination: z.string().min(1),
  endpoint: z.string().url(),
  source: z.string().min(1),
});

const DEFAULT_OPTIONS: z.infer<typeof effectiveRunOptionsSchema> = {
  json: false,
  logDir: "./logs",
  classification: "SENSITIVE",
  destination: DEFAULT_DESTINATION,
  endpoint: DEFAULT_ENDPOINT,
  source: DEFAULT_SOURCE,
};

type CliRunCommandOptions = z.infer<typeof cliRunOptionsSchema>;
export type RunCommandOptions = z.infer<typeof effectiveRunOptionsSchema>;

interface PreparedTransmission {
  results: ShareableResults;
  record: TransmissionRecord;
  pkg: TransmissionPackage;
}

export interface WorkflowOutcome {
  report: Omit<WorkflowReport, "command" | "configPath" | "note">;
  blocked: boolean;
}

function resolveEffectiveRunOptions(
  cliOptions: CliRunCommandOptions,
  config: ShareGateConfig,
): RunCommandOptions {
  const defaults = config.defaults ?? {};
  const transmission = config.transmission ?? {};

  return effectiveRunOptionsSchema.parse({
    json: cliOptions.json ?? defaults.json ?? DEFAULT_OPTIONS.json,
    logDir: cliOptions.logDir ?? defaults.logDir ?? DEFAULT_OPTIONS.logDir,
    classification:
      cliOptions.classification ??
      transmission.classification ??
      DEFAULT_OPTIONS.classification,
    destination: cliOptions.destination ?? transmission.destination ?? DEFAULT_OPTIONS.destination,
    endpoint: transmission.endpoint ?? DEFAULT_OPTIONS.endpoint,
    source: transmission.source ?? DEFAULT_OPTIONS.source,
  });
}

/**
 * Runs both mock assessments through filter, envelope, gate and audit log.
 * A record that fails the gate is marked FAILED and still logged; the other
 * records carry on.
 */
export function runWorkflow(options: RunCommandOptions): WorkflowOutcome {
  const system = new AssessmentSystem();
  const tracker = new TransmissionTracker(options.logDir);
  const transmitter = new SecureTransmitter({
    endpoint: options.endpoint,
    destination: options.destination,
    source: options.source,
  });
  const integration = new PartnerIntegration(transmitter);

  const assessments = [system.runSecurityAssessment(), system.runInfrastructureAssessment()];

  const prepared: PreparedTransmission[] = assessments.map((assessment) => {
    const results = assessment.getShareableResults();
    const bytes = serializePayload(results);
    const record = tracker.createTransmissionRecord({
      dataType: `${assessment.type}_assessment`,
      destination: options.destination,
      classification: options.classification,
      sizeBytes: bytes.length,
    });

    const pkg = integration.preparePackage(results, record);
    record.setDataHash(bytes);
    record.setEncryption(pkg.encryptedPayload.algorithm);

    return { results, record, pkg };
  });

  const outcomes = prepared.map(({ results, record, pkg }) => {
    if (!tracker.validateTransmission(record)) {
      const reason = record.auditTrail.at(-1)?.details ?? "Validation failed";
      record.markFailed(reason);
      return { results, record, outcome: record.status, reason };
    }

    const receipt = transmitter.deliver(pkg);
    record.markTransmitted();
    return { results, record, outcome: record.status, receipt };
  });

  for (const { record } of prepared) {
    tracker.logTransmission(record);
  }

  const transmissions: WorkflowTransmission[] = outcomes.map(
    ({ results, record, outcome, reason, receipt }) => ({
      recordId: record.id,
      dataType: record.dataType,
      findingsCount: results.findings_count,
      dataHash: record.contentHash ?? null,
      outcome,
      status: record.status,
      reason,
      transmissionId: receipt?.transmissionId,
      receiptId: receipt?.response.receiptId,
    }),
  );

  const summaryFile = tracker.writeSummary(path.join(tracker.logDirectory, SUMMARY_FILE));
  const auditFile = tracker.exportAuditLog(path.join(tracker.logDirectory, AUDIT_EXPORT_FILE));

  return {
    blocked: outcomes.some(({ outcome }) => outcome === "FAILED"),
    report: {
      logDir: tracker.logDirectory,
      destination: options.destination,
      classification: options.classification,
      totalAssessments: assessments.length,
      totalFindings: prepared.reduce((sum, { results }) => sum + results.findings_count, 0),
      transmissions,
      summary: tracker.getTransmissionSummary(),
      logFile: tracker.mainLogFile,
      summaryFile,
      auditFile,
    },
  };
}

export async function runWorkflowCommand(rawOptions: unknown): Promise<number> {
  const cliOptions = parseCliOptions(cliRunOptionsSchema, rawOptions);
  const loadedConfig = loadShareGateConfig(cliOptions.config);
  const options = resolveEffectiveRunOptions(cliOptions, loadedConfig.config);

  const { report, blocked } = runWorkflow(options);

  const noteParts = [
    blocked
      ? "Blocked: one or more transmissions failed validation and were logged as failed."
      : "All shareable results encrypted, transmitted and logged.",
  ];
  if (loadedConfig.path) {
    noteParts.push(`Config: ${loadedConfig.path}`);
  }

  const fullReport: WorkflowReport = {
    command: "sharegate run",
    configPath: loadedConfig.path ?? undefined,
    ...report,
    note: noteParts.join(" "),
  };

  if (options.json) {
    printJson(fullReport);
  } else {
    printHumanWorkflowReport(fullReport);
  }

  return blocked ? 20 : 0;
}
