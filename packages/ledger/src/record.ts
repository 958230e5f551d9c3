// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from "zod";
import { CorruptionError, InvalidRecordError } from "./errors.js";

/** Discriminator written on every payment marker. */
export const PAYMENT_MARKER_TYPE = "zakat_paid" as const;

/** Discriminator written on every balance observation. */
export const OBSERVATION_TYPE = "observation" as const;

const TimestampSchema = z
  .string()
  .min(1)
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "Invalid ISO-8601 timestamp" });

/**
 * One monthly balance observation.
 *
 * Field names are snake_case because this is the persisted format.
 */
export const ObservationRecordSchema = z.object({
  type: z.literal(OBSERVATION_TYPE),
  total_assets: z.number().finite(),
  nisab_threshold: z.number().finite(),
  above_nisab: z.boolean(),
  /** Null when the Gregorian date could not be converted. */
  hijri_year: z.number().int().nullable(),
  hijri_month: z.number().int().min(1).max(12).nullable(),
  gregorian_date: z.string(),
  timestamp: TimestampSchema,
});

export type ObservationRecord = z.infer<typeof ObservationRecordSchema>;

/**
 * "Zakat was paid on `gregorian_date`". Carries no balance data; its only
 * effect is to end the streak at its position.
 */
export const PaymentMarkerRecordSchema = z.object({
  type: z.literal(PAYMENT_MARKER_TYPE),
  gregorian_date: z.string(),
  timestamp: TimestampSchema,
});

export type PaymentMarkerRecord = z.infer<typeof PaymentMarkerRecordSchema>;

export type HistoryRecord = ObservationRecord | PaymentMarkerRecord;

export const HistoryRecordSchema = z.discriminatedUnion("type", [
  ObservationRecordSchema,
  PaymentMarkerRecordSchema,
]);

const HistorySchema = z.array(HistoryRecordSchema);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function isPaymentMarker(record: HistoryRecord): record is PaymentMarkerRecord {
  return record.type === PAYMENT_MARKER_TYPE;
}

export function isObservation(record: HistoryRecord): record is ObservationRecord {
  return record.type === OBSERVATION_TYPE;
}

/**
 * Validate decrypted ledger content.
 *
 * @throws CorruptionError when `raw` is not an array of history records.
 */
export function parseHistoryRecords(raw: unknown): HistoryRecord[] {
  const result = HistorySchema.safeParse(raw);
  if (!result.success) {
    throw new CorruptionError("Ledger content is not a valid history", formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate records before they are written and return them in canonical
 * form (unknown keys dropped).
 *
 * @throws InvalidRecordError when any record is malformed.
 */
export function canonicaliseHistoryRecords(records: readonly HistoryRecord[]): HistoryRecord[] {
  const result = HistorySchema.safeParse(records);
  if (!result.success) {
    throw new InvalidRecordError(formatIssues(result.error));
  }
  return result.data;
}

/** Build a payment marker. */
export function createPaymentMarker(gregorianDate: string, timestamp: string): PaymentMarkerRecord {
  return {
    type: PAYMENT_MARKER_TYPE,
    gregorian_date: gregorianDate,
    timestamp,
  };
}
