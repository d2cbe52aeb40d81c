import { z } from "zod";

import { loadShareGateConfig } from "../config/load.js";
import { parseCliOptions } from "../lib/options.js";
import { buildServer } from "../server/app.js";

const cliServeOptionsSchema = z.object({
  config: z.string().optional(),
  host: z.string().min(1).optional(),
  port: z.coerce.number().int().min(1).max(65535).optional(),
});

export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 5000;

export async function runServeCommand(rawOptions: unknown): Promise<number> {
  const cliOptions = parseCliOptions(cliServeOptionsSchema, rawOptions);
  const loadedConfig = loadShareGateConfig(cliOptions.config);
  const server = loadedConfig.config.server ?? {};

  const app = buildServer({ logger: true });
  await app.listen({
    host: cliOptions.host ?? server.host ?? DEFAULT_HOST,
    port: cliOptions.port ?? server.port ?? DEFAULT_PORT,
  });

  return 0;
}
