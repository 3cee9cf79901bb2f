/**
 * gaussfuse - Gaussian fusion graphs
 *
 * Keeps a set of Gaussian distributions, some declared as the
 * precision-weighted fusion of others, consistent as their inputs change, and
 * samples them into point sequences for any rendering layer.
 */

export * from './core';

// Version
export const VERSION = '0.1.0';
