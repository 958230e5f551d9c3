// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { NisabResolver } from './resolver.js';
export type { FetchLike, NisabResolverOptions } from './resolver.js';
export { extractNisab, parseLocalizedNumber } from './parse.js';
export type { NisabBounds, NisabExtraction } from './parse.js';
