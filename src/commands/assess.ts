import { z } from "zod";

import { AssessmentSystem } from "../assessment/system.js";
import { loadShareGateConfig } from "../config/load.js";
import { parseCliOptions } from "../lib/options.js";
import { printHumanAssessReport, printJson, type AssessReport } from "../lib/output.js";

const cliAssessOptionsSchema = z.object({
  config: z.string().optional(),
  json: z.boolean().optional(),
  internal: z.boolean().optional(),
});

export async function runAssessCommand(rawOptions: unknown): Promise<number> {
  const cliOptions = parseCliOptions(cliAssessOptionsSchema, rawOptions);
  const loadedConfig = loadShareGateConfig(cliOptions.config);
  const json = cliOptions.json ?? loadedConfig.config.defaults?.json ?? false;

  const system = new AssessmentSystem();
  const assessments = [system.runSecurityAssessment(), system.runInfrastructureAssessment()];

  const report: AssessReport = {
    command: "sharegate assess",
    view: cliOptions.internal ? "internal" : "shareable",
    configPath: loadedConfig.path ?? undefined,
    assessments: assessments.map((assessment) =>
      cliOptions.internal ? assessment.getFullResults() : assessment.getShareableResults(),
    ),
  };

  if (json) {
    printJson(report);
  } else {
    printHumanAssessReport(report);
  }

  return 0;
}
