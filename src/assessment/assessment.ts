import { sha256Hex, generateId, nowIso } from "../lib/ids.js";
import type {
  AssessmentType,
  Finding,
  ProtectionLevel,
  SeveritySummary,
} from "../types/finding.js";
import { calculateSeveritySummary, filterShareableFindings } from "./filter.js";

export const DEFAULT_SHARING_SOURCE = "Tribal Sovereign Entity";
export const SHARED_CLASSIFICATION = "Shared with Federal Partners";
export const INTERNAL_PROTECTION_NOTE = "Contains Tribal Sovereign Information - Internal Use Only";

export interface AssessmentMetadata {
  tribe: string;
  jurisdiction: string;
}

export interface NewFinding {
  type: string;
  severity: string;
  description: string;
  protectionLevel?: ProtectionLevel;
}

interface AssessmentResultsBase {
  assessment_id: string;
  assessment_type: AssessmentType;
  name: string;
  timestamp: string;
  findings_count: number;
  findings: Finding[];
  severity_summary: SeveritySummary;
}

export interface ShareableResults extends AssessmentResultsBase {
  metadata: {
    source: string;
    classification: typeof SHARED_CLASSIFICATION;
  };
}

export interface FullResults extends AssessmentResultsBase {
  metadata: AssessmentMetadata;
  protection_note: typeof INTERNAL_PROTECTION_NOTE;
}

export class Assessment {
  readonly id: string;
  readonly type: AssessmentType;
  readonly name: string;
  readonly timestamp: string;
  readonly metadata: AssessmentMetadata;
  private readonly findingList: Finding[] = [];

  constructor(type: AssessmentType, name: string, metadata: AssessmentMetadata) {
    this.id = generateId(16);
    this.type = type;
    this.name = name;
    this.timestamp = nowIso();
    this.metadata = { ...metadata };
  }

  get findings(): readonly Finding[] {
    return this.findingList;
  }

  addFinding(input: NewFinding): Finding {
    const finding: Finding = Object.freeze({
      finding_id: sha256Hex(`${this.id}${this.findingList.length}`).slice(0, 12),
      type: input.type,
      severity: input.severity.trim().toLowerCase(),
      description: input.description,
      protection_level: input.protectionLevel ?? "sensitive",
      timestamp: nowIso(),
    });
    this.findingList.push(finding);
    return finding;
  }

  getShareableResults(source = DEFAULT_SHARING_SOURCE): ShareableResults {
    const view = filterShareableFindings(this.findingList);
    return {
      assessment_id: this.id,
      assessment_type: this.type,
      name: this.name,
      timestamp: this.timestamp,
      findings_count: view.findings.length,
      findings: view.findings,
      severity_summary: view.severitySummary,
      metadata: {
        source,
        classification: SHARED_CLASSIFICATION,
      },
    };
  }

  getFullResults(): FullResults {
    const findings = [...this.findingList];
    return {
      assessment_id: this.id,
      assessment_type: this.type,
      name: this.name,
      timestamp: this.timestamp,
      findings_count: findings.length,
      findings,
      severity_summary: calculateSeveritySummary(findings),
      metadata: { ...this.metadata },
      protection_note: INTERNAL_PROTECTION_NOTE,
    };
  }
}
