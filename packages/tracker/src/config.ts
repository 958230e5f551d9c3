// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

/**
 * Values pasted from web pages or password managers often carry
 * non-breaking spaces. They are normalised to plain spaces and trimmed.
 */
const SanitisedStringSchema = z.string().transform((value) => value.replace(/\u00a0/g, ' ').trim());

const CurrencyCodeSchema = z
  .string()
  .regex(/^[A-Z]{3}$/, 'Expected a three-letter upper-case currency code');

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Year progress override
// ---------------------------------------------------------------------------

/**
 * Manually asserted prior streak for users who tracked informally before
 * adopting the tracker.
 *
 * It is never cleared automatically: while enabled it boosts every non-zero
 * streak. It never revives a streak of zero.
 */
export const YearProgressOverrideSchema = z.object({
  enabled: z.boolean().default(false),
  months_above_nisab: z.number().int().min(0).max(11).default(0),
  /** Free-form Hijri date the count was asserted on, e.g. "15/7/1446". */
  as_of_hijri_date: z.string().default(''),
});

export type YearProgressOverride = z.infer<typeof YearProgressOverrideSchema>;

export const DISABLED_OVERRIDE: YearProgressOverride = {
  enabled: false,
  months_above_nisab: 0,
  as_of_hijri_date: '',
};

// ---------------------------------------------------------------------------
// Tracker config
// ---------------------------------------------------------------------------

export const TrackerConfigSchema = z.object({
  /** Ledger cap, observations and payment markers combined. */
  maxHistoryEntries: z.number().int().positive().default(24),
  /** Streak length at which the holding year is complete. */
  hijriYearMonths: z.number().int().positive().default(12),
  zakatRate: z.number().gt(0).max(1).default(0.025),
  /** Assets held outside the tracked accounts, in the reference currency. */
  additionalAssets: z.number().finite().min(0).default(0),
  /**
   * When true, the streak also stops at two counted observations that are
   * not in successive Hijri months. Off by default: the streak counts
   * ledger entries.
   */
  strictCalendar: z.boolean().default(false),
  yearProgressOverride: YearProgressOverrideSchema.default({}),
});

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type TrackerConfigInput = z.input<typeof TrackerConfigSchema>;

// ---------------------------------------------------------------------------
// Normalizer config
// ---------------------------------------------------------------------------

/** One bank account expected in a source's statements. */
const AccountConfigSchema = z.object({
  accountId: SanitisedStringSchema.pipe(z.string().min(1)),
  currency: CurrencyCodeSchema,
});

/**
 * Everything one statement source needs, handed to that source alone.
 * `credentials` is opaque to the tracker.
 */
export const StatementSourceConfigSchema = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  accounts: z.array(AccountConfigSchema).default([]),
  credentials: z.record(SanitisedStringSchema).default({}),
});

export type StatementSourceConfig = z.infer<typeof StatementSourceConfigSchema>;

export const NormalizerConfigSchema = z
  .object({
    referenceCurrency: CurrencyCodeSchema.default('BAM'),
    /** Units of the reference currency per one unit of the keyed currency. */
    conversionRates: z.record(CurrencyCodeSchema, z.number().positive()).default({ EUR: 1.95583 }),
    sources: z.array(StatementSourceConfigSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.sources.forEach((source, index) => {
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'name'],
          message: `Duplicate source name "${source.name}"`,
        });
      }
      seen.add(source.name);
    });
  });

export type NormalizerConfig = z.infer<typeof NormalizerConfigSchema>;
export type NormalizerConfigInput = z.input<typeof NormalizerConfigSchema>;

// ---------------------------------------------------------------------------
// Nisab config
// ---------------------------------------------------------------------------

export const DEFAULT_NISAB_URLS: readonly string[] = [
  'https://zekat.ba',
  'https://zekat.ba/nisab',
  'https://zekat.ba/kalkulator',
];

/**
 * Patterns tried in order against each page. The first capture group must
 * hold a number in `1.234,56` form.
 */
export const DEFAULT_NISAB_PATTERNS: readonly string[] = [
  String.raw`Aktuelni nisab:\s*(\d{1,2}\.\d{3},\d{2})\s*KM`,
  String.raw`Nisab:\s*(\d{1,2}\.\d{3},\d{2})\s*KM`,
  String.raw`nisab.*?(\d{1,2}\.\d{3},\d{2}).*?KM`,
];

export const NisabConfigSchema = z
  .object({
    fallbackValue: z.number().positive().default(24_624),
    minValue: z.number().positive().default(5_000),
    maxValue: z.number().positive().default(35_000),
    urls: z.array(z.string().url()).default([...DEFAULT_NISAB_URLS]),
    patterns: z
      .array(
        z.string().refine(
          (source) => {
            try {
              new RegExp(source, 'i');
              return true;
            } catch {
              return false;
            }
          },
          { message: 'Not a valid regular expression' },
        ),
      )
      .min(1)
      .default([...DEFAULT_NISAB_PATTERNS]),
    timeoutMs: z.number().int().positive().default(10_000),
  })
  .refine((config) => config.minValue < config.maxValue, {
    message: 'minValue must be below maxValue',
    path: ['minValue'],
  });

export type NisabConfig = z.infer<typeof NisabConfigSchema>;
export type NisabConfigInput = z.input<typeof NisabConfigSchema>;

// ---------------------------------------------------------------------------
// Root config
// ---------------------------------------------------------------------------

export const HawlConfigSchema = z.object({
  tracker: TrackerConfigSchema.default({}),
  normalizer: NormalizerConfigSchema.default({}),
  nisab: NisabConfigSchema.default({}),
});

export type HawlConfig = z.infer<typeof HawlConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

/**
 * Parse and validate a raw config object, throwing InvalidConfigError on
 * failure.
 */
export function parseHawlConfig(raw: unknown): HawlConfig {
  return parseWith(HawlConfigSchema, raw);
}

export function parseTrackerConfig(raw: unknown): TrackerConfig {
  return parseWith(TrackerConfigSchema, raw);
}

export function parseNormalizerConfig(raw: unknown): NormalizerConfig {
  return parseWith(NormalizerConfigSchema, raw);
}

export function parseNisabConfig(raw: unknown): NisabConfig {
  return parseWith(NisabConfigSchema, raw);
}

export function parseYearProgressOverride(raw: unknown): YearProgressOverride {
  return parseWith(YearProgressOverrideSchema, raw);
}
