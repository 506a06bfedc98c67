/**
 * Analytics module exports
 * Failure streaks, flaky and permanently failing tests, commit bisection
 */

export { RunLoader, partitionOutcomes } from './run-loader.js';
export { countConsecutiveFailures, streakOf, findStreakStart } from './streaks.js';
export { FlakinessDetector, findSuccesses } from './flakiness.js';
export { detectPermafails } from './permafail.js';
export { findLastGoodRun } from './first-failure.js';
export { CommitBisector, formatBisectionMessage } from './bisection.js';
export { RegressionDetectionEngine, type DetectionEngineOptions } from './detection-engine.js';
