// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { BalanceNormalizer } from './normalizer.js';
export type { BalanceNormalizerOptions, StatementSource } from './normalizer.js';
export {
  DEFAULT_CONVERSION,
  conversionRate,
  convertReadings,
  latestPeriodEnd,
  normalizeReadings,
} from './normalize.js';
export type { CurrencyConversion, NormalizeOptions } from './normalize.js';
