// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { DEFAULT_HIJRI_YEAR_MONTHS, DEFAULT_ZAKAT_RATE, evaluateEligibility } from './eligibility.js';
export type { EligibilityInput, EligibilityOptions, EligibilityResult } from './eligibility.js';
export { applyYearProgressOverride, computeStreak } from './streak.js';
export type { OverrideOutcome, StreakOptions } from './streak.js';
