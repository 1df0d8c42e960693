export {
  RetryOrchestrator,
  DEFAULT_RETRY_POLICY,
  type RetryOutcome,
  type RetryOrchestratorOptions,
  type ExecuteOptions,
} from './retry-orchestrator.js';
