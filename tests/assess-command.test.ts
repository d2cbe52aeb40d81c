import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  printJson: vi.fn(),
  printHumanAssessReport: vi.fn(),
}));

vi.mock("../src/lib/output.js", () => ({
  printJson: mocks.printJson,
  printHumanAssessReport: mocks.printHumanAssessReport,
}));

import { runAssessCommand } from "../src/commands/assess.js";
import type { AssessReport } from "../src/lib/output.js";

describe("runAssessCommand", () => {
  beforeEach(() => {
    mocks.printJson.mockReset();
    mocks.printHumanAssessReport.mockReset();
  });

  it("prints only shareable findings by default", async () => {
    const code = await runAssessCommand({});

    expect(code).toBe(0);
    expect(mocks.printJson).not.toHaveBeenCalled();
    const report: AssessReport = mocks.printHumanAssessReport.mock.calls[0]?.[0];
    expect(report.view).toBe("shareable");
    expect(report.assessments.map((results) => results.findings_count)).toEqual([2, 2]);
    expect(report.assessments[0]?.metadata).toEqual({
      source: "Tribal Sovereign Entity",
      classification: "Shared with Federal Partners",
    });
  });

  it("prints the internal view with every finding as JSON", async () => {
    const code = await runAssessCommand({ internal: true, json: true });

    expect(code).toBe(0);
    const report: AssessReport = mocks.printJson.mock.calls[0]?.[0];
    expect(report.view).toBe("internal");
    expect(report.assessments.map((results) => results.findings_count)).toEqual([3, 2]);
    expect(report.assessments[0]?.severity_summary.info).toBe(3);
  });

  it("rejects option values of the wrong type", async () => {
    await expect(runAssessCommand({ json: "yes" })).rejects.toMatchObject({ code: "INVALID_OPTIONS" });
  });
});
