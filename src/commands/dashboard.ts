import path from "node:path";

import { z } from "zod";

import { loadShareGateConfig } from "../config/load.js";
import { parseCliOptions } from "../lib/options.js";
import { printHumanDashboardReport, printJson, type DashboardReport } from "../lib/output.js";
import { readAuditExport, readTransmissionLog } from "../tracking/reader.js";
import { AUDIT_EXPORT_FILE, TRANSMISSION_LOG_FILE } from "../tracking/tracker.js";
import { DEFAULT_SOURCE } from "../transmission/transmitter.js";

const cliDashboardOptionsSchema = z.object({
  config: z.string().optional(),
  json: z.boolean().optional(),
  logDir: z.string().min(1).optional(),
  detailed: z.boolean().optional(),
});

export async function runDashboardCommand(rawOptions: unknown): Promise<number> {
  const cliOptions = parseCliOptions(cliDashboardOptionsSchema, rawOptions);
  const loadedConfig = loadShareGateConfig(cliOptions.config);
  const defaults = loadedConfig.config.defaults ?? {};
  const json = cliOptions.json ?? defaults.json ?? false;
  const logDir = path.resolve(cliOptions.logDir ?? defaults.logDir ?? "./logs");
  const logFile = path.join(logDir, TRANSMISSION_LOG_FILE);

  const entries = readTransmissionLog(logFile);
  if (entries === null) {
    console.log("No transmission data found. Run the workflow first.");
    return 0;
  }
  if (entries.length === 0) {
    console.log("No transmissions recorded yet.");
    return 0;
  }

  const transmissions = entries.map((entry) => entry.record);
  const report: DashboardReport = {
    command: "sharegate dashboard",
    logFile,
    source: loadedConfig.config.transmission?.source ?? DEFAULT_SOURCE,
    totalTransmissions: transmissions.length,
    totalBytes: transmissions.reduce((sum, record) => sum + record.data_size_bytes, 0),
    transmissions,
    audit: cliOptions.detailed ? readAuditExport(path.join(logDir, AUDIT_EXPORT_FILE)) : undefined,
  };

  if (json) {
    printJson(report);
  } else {
    printHumanDashboardReport(report);
  }

  return 0;
}
