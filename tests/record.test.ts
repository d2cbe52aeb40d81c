import { createHash } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { ShareGateError } from "../src/lib/errors.js";
import { TransmissionRecord } from "../src/tracking/record.js";
import { TransmissionTracker } from "../src/tracking/tracker.js";

function makeRecord(): TransmissionRecord {
  return new TransmissionRecord({
    dataType: "test_assessment",
    destination: "Partner",
    classification: "SENSITIVE",
    sizeBytes: 1024,
  });
}

describe("transmission record", () => {
  it("starts pending with no hash, no encryption and an empty trail", () => {
    const record = makeRecord();

    expect(record.id).toMatch(/^[0-9a-f]{24}$/);
    expect(record.status).toBe("PENDING");
    expect(record.contentHash).toBeUndefined();
    expect(record.encryptionMethod).toBeUndefined();
    expect(record.auditTrail).toEqual([]);
  });

  it("hashes data with SHA-256 and records the step", () => {
    const record = makeRecord();
    const expected = createHash("sha256").update("test data").digest("hex");

    record.setDataHash(Buffer.from("test data"));

    expect(record.contentHash).toBe(expected);
    expect(record.auditTrail).toHaveLength(1);
    expect(record.auditTrail[0]?.action).toBe("DATA_HASHED");
    expect(record.auditTrail[0]?.details).toBe(`SHA-256 hash calculated: ${expected.slice(0, 16)}...`);
  });

  it("records the encryption method", () => {
    const record = makeRecord();

    record.setEncryption("AES-256-GCM");

    expect(record.encryptionMethod).toBe("AES-256-GCM");
    expect(record.auditTrail[0]).toMatchObject({
      action: "ENCRYPTED",
      details: "Data encrypted using AES-256-GCM",
    });
  });

  it("refuses to transmit a record that was never approved", () => {
    const record = makeRecord();

    expect(() => record.markTransmitted()).toThrowError(/cannot move from PENDING to TRANSMITTED/);
    expect(record.status).toBe("PENDING");
    expect(record.auditTrail).toEqual([]);
  });

  it("refuses to transmit a TRIBAL_SOVEREIGN record the gate rejected", () => {
    const logDir = fs.mkdtempSync(path.join(os.tmpdir(), "sharegate-record-"));
    try {
      const tracker = new TransmissionTracker(logDir);
      const record = tracker.createTransmissionRecord({
        dataType: "security_assessment",
        destination: "Partner",
        classification: "TRIBAL_SOVEREIGN",
        sizeBytes: 10,
      });
      record.setDataHash("payload");
      record.setEncryption("AES-256-GCM");

      expect(tracker.validateTransmission(record)).toBe(false);
      expect(() => record.markTransmitted()).toThrow(ShareGateError);
      expect(record.status).toBe("PENDING");
    } finally {
      fs.rmSync(logDir, { recursive: true, force: true });
    }
  });

  it("moves an approved record to TRANSMITTED and refuses to go again", () => {
    const record = makeRecord();
    record.approve();

    record.markTransmitted();
    expect(record.status).toBe("TRANSMITTED");
    expect(record.auditTrail.at(-1)?.details).toBe("Data successfully transmitted to destination");

    expect(() => record.markTransmitted()).toThrow(ShareGateError);
    expect(() => record.markFailed("late")).toThrowError(/cannot move from TRANSMITTED to FAILED/);
  });

  it("records the failure reason", () => {
    const record = makeRecord();

    record.markFailed("link down");

    expect(record.status).toBe("FAILED");
    expect(record.auditTrail.at(-1)).toMatchObject({
      action: "FAILED",
      details: "Transmission failed: link down",
    });
  });

  it("serializes to the snake_case log form", () => {
    const record = makeRecord();
    record.setEncryption("AES-256-GCM");

    const json = record.toJSON();

    expect(json).toMatchObject({
      record_id: record.id,
      data_type: "test_assessment",
      destination: "Partner",
      classification: "SENSITIVE",
      data_size_bytes: 1024,
      status: "PENDING",
      data_hash: null,
      encryption_method: "AES-256-GCM",
      tribal_ip_protected: true,
    });
    expect(json.audit_trail).toHaveLength(1);
    expect(json.audit_trail).not.toBe(record.auditTrail);
  });
});
