import {
  SEVERITY_LEVELS,
  type Finding,
  type ProtectionLevel,
  type Severity,
  type SeveritySummary,
} from "../types/finding.js";

export const SHAREABLE_PROTECTION_LEVELS: ReadonlySet<ProtectionLevel> = new Set<ProtectionLevel>([
  "public",
  "sensitive",
]);

export interface ShareableView {
  findings: Finding[];
  severitySummary: SeveritySummary;
}

const SEVERITY_SET: ReadonlySet<string> = new Set(SEVERITY_LEVELS);

function isSeverity(value: string): value is Severity {
  return SEVERITY_SET.has(value);
}

export function isShareable(finding: Finding): boolean {
  return SHAREABLE_PROTECTION_LEVELS.has(finding.protection_level);
}

export function calculateSeveritySummary(findings: readonly Finding[]): SeveritySummary {
  const summary: SeveritySummary = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };

  for (const finding of findings) {
    const severity = finding.severity.trim().toLowerCase();
    summary[isSeverity(severity) ? severity : "info"] += 1;
  }

  return summary;
}

/**
 * Keeps public and sensitive findings in their original order; confidential
 * and tribal_sovereign findings never cross the export boundary.
 */
export function filterShareableFindings(findings: readonly Finding[]): ShareableView {
  const shareable = findings.filter(isShareable);
  return {
    findings: shareable,
    severitySummary: calculateSeveritySummary(shareable),
  };
}
