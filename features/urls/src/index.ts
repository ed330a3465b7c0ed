/**
 * @wp-promote/urls
 * Staging -> production URL rewrite and validation
 */

export {
  RewriteService,
  sqlReplacePass,
  type RewriteDeps,
  type RewritePreview,
  type SqlPassResult,
} from './rewrite.service.js';
export { ValidateService, type ValidateDeps, type RepairOutcome } from './validate.service.js';
export { checkSerialized, looksSerialized, type SerializedCheck } from './serialized.js';
