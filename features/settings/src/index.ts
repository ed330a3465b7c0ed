/**
 * @wp-promote/settings
 * Production settings, cache flushing and post-deploy checks
 */

export { SettingsService, type SettingsDeps, type RetryPolicy } from './settings.service.js';
export { VerifyService, type VerifyDeps } from './verify.service.js';
