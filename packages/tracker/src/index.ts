// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @hawl/tracker: nisab threshold tracking over an encrypted balance ledger.
 *
 * Public API surface:
 *
 *   Facade:
 *     NisabTracker  : runAnalysis, recordPayment, getHistory, getCurrentStreak
 *     NisabMonitor  : one collect -> resolve -> analyse cycle
 *
 *   Inputs:
 *     BalanceNormalizer, normalizeReadings : statement readings to one total
 *     NisabResolver, extractNisab          : current nisab with fallback
 *
 *   Engine (pure):
 *     evaluateEligibility, computeStreak, applyYearProgressOverride
 *
 *   Supporting:
 *     PaymentRecorder, TrackerEventEmitter, TrackerTracer, SerialQueue,
 *     config schemas, calendar helpers, maskAccount, runCli
 */

// Facade
export { NisabTracker } from './tracker.js';
export type { NisabTrackerOptions } from './tracker.js';
export { NisabMonitor } from './monitor.js';
export type { NisabMonitorOptions, NisabProvider, ObservationCollector } from './monitor.js';
export { PaymentRecorder } from './payment/recorder.js';
export type { PaymentRecorderOptions } from './payment/recorder.js';

// Engine
export {
  DEFAULT_HIJRI_YEAR_MONTHS,
  DEFAULT_ZAKAT_RATE,
  applyYearProgressOverride,
  computeStreak,
  evaluateEligibility,
} from './engine/index.js';
export type {
  EligibilityInput,
  EligibilityOptions,
  EligibilityResult,
  OverrideOutcome,
  StreakOptions,
} from './engine/index.js';

// Normalizer
export {
  BalanceNormalizer,
  DEFAULT_CONVERSION,
  conversionRate,
  convertReadings,
  latestPeriodEnd,
  normalizeReadings,
} from './normalizer/index.js';
export type {
  BalanceNormalizerOptions,
  CurrencyConversion,
  NormalizeOptions,
  StatementSource,
} from './normalizer/index.js';

// Nisab
export { NisabResolver, extractNisab, parseLocalizedNumber } from './nisab/index.js';
export type { FetchLike, NisabBounds, NisabExtraction, NisabResolverOptions } from './nisab/index.js';

// Config
export {
  DEFAULT_NISAB_PATTERNS,
  DEFAULT_NISAB_URLS,
  DISABLED_OVERRIDE,
  HawlConfigSchema,
  NisabConfigSchema,
  NormalizerConfigSchema,
  StatementSourceConfigSchema,
  TrackerConfigSchema,
  YearProgressOverrideSchema,
  parseHawlConfig,
  parseNisabConfig,
  parseNormalizerConfig,
  parseTrackerConfig,
  parseYearProgressOverride,
} from './config.js';
export type {
  HawlConfig,
  NisabConfig,
  NisabConfigInput,
  NormalizerConfig,
  NormalizerConfigInput,
  StatementSourceConfig,
  TrackerConfig,
  TrackerConfigInput,
  YearProgressOverride,
} from './config.js';

// Dates
export {
  calendarDateOf,
  calendarDateToIso,
  compareCalendarDates,
  formatCalendarDate,
  formatHijriDate,
  isSuccessiveHijriMonth,
  parseCalendarDate,
  requireCalendarDate,
  toHijri,
} from './dates.js';
export type { CalendarDate, HijriDate } from './dates.js';

// Events
export {
  EVENT_ANALYSIS_COMPLETED,
  EVENT_NISAB_RESOLVED,
  EVENT_OBSERVATION_RECORDED,
  EVENT_OVERRIDE_APPLIED,
  EVENT_PAYMENT_RECORDED,
  EVENT_SOURCE_FAILED,
  TrackerEventEmitter,
} from './events.js';
export type {
  TrackerAnalysisCompletedEventPayload,
  TrackerEventListener,
  TrackerEventName,
  TrackerEventPayloadMap,
  TrackerNisabResolvedEventPayload,
  TrackerObservationRecordedEventPayload,
  TrackerOverrideAppliedEventPayload,
  TrackerPaymentRecordedEventPayload,
  TrackerSourceFailedEventPayload,
} from './events.js';

// Telemetry
export { TrackerTracer } from './telemetry/otel.js';
export type { OTelSpanLike, OTelTracerLike, TrackerOTelConfig } from './telemetry/otel.js';

// Utilities
export { SerialQueue } from './serial-queue.js';
export { maskAccount } from './masking.js';
export { CliUsageError, formatHistoryLine, parseCliArgs, runCli } from './cli.js';
export type { CliArgs, CliCommand, CliDependencies, CliIo } from './cli.js';

// Types
export type {
  AccountContribution,
  AnalysisReport,
  BalanceReading,
  EligibilityVerdict,
  NisabResolution,
  NisabSource,
  NormalizedObservation,
  SourceBreakdown,
} from './types.js';

// Errors
export { InvalidConfigError, InvalidDateError, NoDataError, TrackerError } from './errors.js';
export {
  CorruptionError,
  DecryptionError,
  EncryptedFileLedger,
  GitSyncLedger,
  LedgerError,
  MemoryLedger,
} from '@hawl/ledger';
export type { HistoryRecord, LedgerBackend, ObservationRecord, PaymentMarkerRecord } from '@hawl/ledger';
