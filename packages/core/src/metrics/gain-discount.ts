import type { GainFn, RankDiscountFn } from '../types/metric.js';

/** Exponential gain: 2^label - 1. */
export const defaultGain: GainFn = (label) => Math.pow(2, label) - 1;

/** Logarithmic discount: ln(2) / ln(1 + rank). Rank 1 maps to 1. */
export const defaultRankDiscount: RankDiscountFn = (rank) => Math.LN2 / Math.log1p(rank);

/** Identity gain, the alpha-DCG default. */
export const identityGain: GainFn = (value) => value;
