/**
 * @wp-promote/shared - Base URL handling
 *
 * Base URLs are kept scheme-less (`stage.example.com`, `example.com/blog`).
 * Production is always promoted as https.
 */

import type { ReplacementPair } from '../types/index.js';

export function normalizeBaseURL(value: string): string {
  return value
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/\/+$/, '');
}

/**
 * Ordered replacement pairs. Scheme-qualified pairs come first so that
 * `http://stage` ends up `https://prod` rather than `http://prod`.
 */
export function buildReplacementPairs(stageBaseURL: string, prodBaseURL: string): ReplacementPair[] {
  return [
    { from: `https://${stageBaseURL}`, to: `https://${prodBaseURL}` },
    { from: `http://${stageBaseURL}`, to: `https://${prodBaseURL}` },
    { from: stageBaseURL, to: prodBaseURL },
  ];
}

/** Apply the pairs in order with literal (non-regex) substring replacement. */
export function rewriteText(value: string, pairs: readonly ReplacementPair[]): string {
  return pairs.reduce((text, pair) => text.split(pair.from).join(pair.to), value);
}
