import { describe, expect, it } from "vitest";

import {
  INTERNAL_PROTECTION_NOTE,
  SHARED_CLASSIFICATION,
} from "../src/assessment/assessment.js";
import { AssessmentSystem, DEFAULT_ASSESSMENT_METADATA } from "../src/assessment/system.js";

describe("assessment views", () => {
  it("shares one of a public and a tribal_sovereign finding", () => {
    const system = new AssessmentSystem();
    const assessment = system.createAssessment("security", "Test Security Assessment");

    assessment.addFinding({
      type: "test_finding",
      severity: "info",
      description: "Test finding",
      protectionLevel: "public",
    });
    assessment.addFinding({
      type: "tribal_finding",
      severity: "info",
      description: "Tribal sovereign information",
      protectionLevel: "tribal_sovereign",
    });

    const shareable = assessment.getShareableResults();
    expect(shareable.findings_count).toBe(1);
    expect(shareable.findings[0]?.protection_level).toBe("public");
    expect(shareable.metadata.classification).toBe(SHARED_CLASSIFICATION);

    const full = assessment.getFullResults();
    expect(full.findings_count).toBe(2);
    expect(full.metadata).toEqual(DEFAULT_ASSESSMENT_METADATA);
    expect(full.protection_note).toBe(INTERNAL_PROTECTION_NOTE);
  });

  it("defaults protection level to sensitive and normalizes severity", () => {
    const assessment = new AssessmentSystem().createAssessment("compliance", "Defaults");

    const finding = assessment.addFinding({
      type: "policy",
      severity: " High ",
      description: "Policy gap",
    });

    expect(finding.protection_level).toBe("sensitive");
    expect(finding.severity).toBe("high");
    expect(finding.finding_id).toMatch(/^[0-9a-f]{12}$/);
    expect(assessment.getShareableResults().severity_summary.high).toBe(1);
  });

  it("gives each finding a distinct id and freezes it", () => {
    const assessment = new AssessmentSystem().createAssessment("capacity", "Ids");
    const first = assessment.addFinding({ type: "a", severity: "low", description: "a" });
    const second = assessment.addFinding({ type: "b", severity: "low", description: "b" });

    expect(first.finding_id).not.toBe(second.finding_id);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("uses the given sharing source in the shareable metadata", () => {
    const assessment = new AssessmentSystem().createAssessment("security", "Source");

    expect(assessment.getShareableResults("Example Nation").metadata.source).toBe("Example Nation");
  });
});

describe("assessment system", () => {
  it("runs the security assessment with one finding held back", () => {
    const system = new AssessmentSystem();
    const assessment = system.runSecurityAssessment();

    expect(assessment.type).toBe("security");
    expect(assessment.findings).toHaveLength(3);

    const shareable = assessment.getShareableResults();
    expect(shareable.findings_count).toBe(2);
    expect(shareable.findings.map((finding) => finding.type)).toEqual(["network_security", "encryption"]);
    expect(shareable.severity_summary.info).toBe(2);
  });

  it("runs the infrastructure assessment with everything shareable", () => {
    const assessment = new AssessmentSystem().runInfrastructureAssessment();

    expect(assessment.type).toBe("infrastructure");
    expect(assessment.getShareableResults().findings_count).toBe(2);
  });

  it("looks up assessments by id", () => {
    const system = new AssessmentSystem();
    const security = system.runSecurityAssessment();
    system.runInfrastructureAssessment();

    expect(system.assessments).toHaveLength(2);
    expect(system.getAssessment(security.id)).toBe(security);
    expect(system.getAssessment("missing")).toBeUndefined();
  });
});
