export { runWithFallback, sleep, type RetryOutcome, type RetryState, type FallbackPlan } from './retry.js';
export { sqlString, escapeLike, containsPattern, isValidIdentifier, quoteIdentifier } from './sql.js';
export { formatTimestamp, parseTimestamp, displayTimestamp } from './timestamp.js';
export { normalizeBaseURL, buildReplacementPairs, rewriteText } from './url.js';
