import type { z } from "zod";

import { ShareGateError } from "./errors.js";

export function parseCliOptions<T extends z.ZodTypeAny>(schema: T, rawOptions: unknown): z.output<T> {
  const parsed = schema.safeParse(rawOptions);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ShareGateError("INVALID_OPTIONS", `Invalid options: ${details}`);
  }
  return parsed.data;
}
