import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { ShareGateError } from "../lib/errors.js";
import { CLASSIFICATIONS } from "../types/transmission.js";

export const CONFIG_FILE_NAME = "sharegate.config.json";

export const classificationSchema = z.enum(CLASSIFICATIONS);

const defaultsSchema = z
  .object({
    json: z.boolean().optional(),
    logDir: z.string().min(1).optional(),
  })
  .strict();

const transmissionSchema = z
  .object({
    destination: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    source: z.string().min(1).optional(),
    classification: classificationSchema.optional(),
  })
  .strict();

const serverSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
  })
  .strict();

const shareGateConfigSchema = z
  .object({
    defaults: defaultsSchema.optional(),
    transmission: transmissionSchema.optional(),
    server: serverSchema.optional(),
  })
  .strict();

export type ShareGateConfig = z.infer<typeof shareGateConfigSchema>;

export interface LoadedConfig {
  path: string | null;
  config: ShareGateConfig;
}

export function loadShareGateConfig(configPathOption?: string): LoadedConfig {
  const explicitPath = configPathOption?.trim();

  let resolvedPath: string | null = null;
  if (explicitPath) {
    resolvedPath = path.resolve(explicitPath);
    if (!fs.existsSync(resolvedPath)) {
      throw new ShareGateError("INVALID_CONFIG", `Config file not found: ${resolvedPath}`);
    }
  } else {
    const defaultPath = path.resolve(process.cwd(), CONFIG_FILE_NAME);
    if (fs.existsSync(defaultPath)) {
      resolvedPath = defaultPath;
    }
  }

  if (!resolvedPath) {
    return { path: null, config: {} };
  }

  let parsedJson: unknown;
  try {
    const raw = fs.readFileSync(resolvedPath, "utf8");
    parsedJson = JSON.parse(raw);
  } catch (error) {
    throw new ShareGateError(
      "INVALID_CONFIG",
      `Failed to parse JSON config at ${resolvedPath}`,
      { cause: error },
    );
  }

  const parsed = shareGateConfigSchema.safeParse(parsedJson);
  if (!parsed.success) {
    throw new ShareGateError(
      "INVALID_CONFIG",
      `Invalid sharegate config at ${resolvedPath}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
    );
  }

  return {
    path: resolvedPath,
    config: parsed.data,
  };
}
