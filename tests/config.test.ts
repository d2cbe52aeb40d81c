import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ShareGateError } from "../src/lib/errors.js";
import { loadShareGateConfig } from "../src/config/load.js";

const originalCwd = process.cwd();

afterEach(() => {
  process.chdir(originalCwd);
});

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "sharegate-config-test-"));
}

describe("sharegate config", () => {
  it("loads default config file from cwd", () => {
    const dir = makeTempDir();
    const configPath = path.join(dir, "sharegate.config.json");

    fs.writeFileSync(
      configPath,
      JSON.stringify({
        defaults: { json: true, logDir: "./audit" },
        transmission: { destination: "Regional SOC", classification: "PUBLIC" },
        server: { port: 8080 },
      }),
      "utf8",
    );

    process.chdir(dir);
    const loaded = loadShareGateConfig();

    expect(loaded.path).toBe(configPath);
    expect(loaded.config.defaults?.json).toBe(true);
    expect(loaded.config.defaults?.logDir).toBe("./audit");
    expect(loaded.config.transmission?.destination).toBe("Regional SOC");
    expect(loaded.config.transmission?.classification).toBe("PUBLIC");
    expect(loaded.config.server?.port).toBe(8080);
  });

  it("returns an empty config when no file is present", () => {
    const dir = makeTempDir();
    process.chdir(dir);

    expect(loadShareGateConfig()).toEqual({ path: null, config: {} });
  });

  it("throws INVALID_CONFIG for broken JSON", () => {
    const dir = makeTempDir();
    const configPath = path.join(dir, "sharegate.config.json");
    fs.writeFileSync(configPath, "{not-json", "utf8");

    process.chdir(dir);

    expect(() => loadShareGateConfig()).toThrow(ShareGateError);
    expect(() => loadShareGateConfig()).toThrowError(/Failed to parse JSON config/i);
  });

  it("throws INVALID_CONFIG when explicit config path is missing", () => {
    const dir = makeTempDir();
    process.chdir(dir);

    expect(() => loadShareGateConfig("./missing.json")).toThrowError(/Config file not found/);
  });

  it("rejects unknown keys and unknown classifications", () => {
    const dir = makeTempDir();
    const unknownKey = path.join(dir, "unknown-key.json");
    const badClassification = path.join(dir, "bad-classification.json");
    fs.writeFileSync(unknownKey, JSON.stringify({ defaults: { verbose: true } }), "utf8");
    fs.writeFileSync(
      badClassification,
      JSON.stringify({ transmission: { classification: "SECRET" } }),
      "utf8",
    );

    expect(() => loadShareGateConfig(unknownKey)).toThrowError(/Invalid sharegate config/);
    expect(() => loadShareGateConfig(badClassification)).toThrowError(/Invalid sharegate config/);
  });
});
