import { createHash, randomBytes } from "node:crypto";

export function sha256Hex(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

export function nowIso(): string {
  return new Date().toISOString();
}

/** Hex id of the given length from the current time plus random salt. */
export function generateId(length: number): string {
  return sha256Hex(`${nowIso()}${randomBytes(8).toString("hex")}`).slice(0, length);
}
