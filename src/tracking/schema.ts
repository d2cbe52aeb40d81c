import { z } from "zod";

import { CLASSIFICATIONS, TRANSMISSION_STATUSES } from "../types/transmission.js";

export const auditEntrySchema = z.object({
  timestamp: z.string(),
  action: z.string(),
  details: z.string(),
});

export const recordJsonSchema = z.object({
  record_id: z.string(),
  data_type: z.string(),
  destination: z.string(),
  classification: z.enum(CLASSIFICATIONS),
  data_size_bytes: z.number().int().nonnegative(),
  timestamp: z.string(),
  status: z.enum(TRANSMISSION_STATUSES),
  data_hash: z.string().nullable(),
  encryption_method: z.string().nullable(),
  tribal_ip_protected: z.boolean(),
  audit_trail: z.array(auditEntrySchema),
});

export const logEntrySchema = z.object({
  log_timestamp: z.string(),
  record: recordJsonSchema,
});

export const auditLogExportSchema = z.object({
  export_timestamp: z.string(),
  summary: z.object({
    total_transmissions: z.number().int().nonnegative(),
    status_breakdown: z.record(z.number()),
    classification_breakdown: z.record(z.number()),
    destination_breakdown: z.record(z.number()),
    log_file: z.string(),
  }),
  records: z.array(recordJsonSchema),
});

export type LoggedRecord = z.infer<typeof recordJsonSchema>;
export type LoggedEntry = z.infer<typeof logEntrySchema>;
export type LoggedAuditExport = z.infer<typeof auditLogExportSchema>;
