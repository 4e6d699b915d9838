/**
 * Application layer: wizard, input sources and the deployment orchestrator.
 */

export {
  createDeploymentOrchestrator,
  type DeploymentOrchestrator,
  type OrchestratorOptions,
  type RunOutcome,
} from './orchestrator';
export { createServices, type ServiceOptions } from './services';
export { startWizard, askUninstallNamespace, type WizardOptions, type WizardSession } from './wizard';
export {
  collectOverrides,
  createNonInteractiveInput,
  WIZARD_FIELDS,
  type InputSource,
  type WizardField,
  type WizardOverrides,
} from './input-source';
export { createInteractiveInput } from './interactive-input';
