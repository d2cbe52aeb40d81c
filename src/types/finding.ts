export const SEVERITY_LEVELS = ["critical", "high", "medium", "low", "info"] as const;

export type Severity = (typeof SEVERITY_LEVELS)[number];

export type ProtectionLevel = "public" | "sensitive" | "confidential" | "tribal_sovereign";

export type AssessmentType = "security" | "infrastructure" | "compliance" | "capacity";

export interface Finding {
  readonly finding_id: string;
  readonly type: string;
  /**
   * Lower-cased; normally one of {@link SEVERITY_LEVELS}. Other values are
   * kept and tallied as "info".
   */
  readonly severity: string;
  readonly description: string;
  readonly protection_level: ProtectionLevel;
  readonly timestamp: string;
}

export type SeveritySummary = Record<Severity, number>;
