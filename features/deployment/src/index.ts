/**
 * @wp-promote/deployment
 * Preflight, the deploy pipeline, diagnostics and the run summary
 */

export { PreflightService, REQUIRED_TOOLS, type PreflightDeps } from './preflight.service.js';
export { DeployPipeline, type DeployConfirmations, type PipelineDeps } from './pipeline.js';
export {
  DiagnoseService,
  type DiagnoseDeps,
  type DiagnosticReport,
  type EnvironmentDiagnostics,
} from './diagnose.service.js';
export { formatSummary, MANUAL_CHECKLIST } from './summary.js';
export { createServices, type Services, type ServiceOptions } from './services.js';
