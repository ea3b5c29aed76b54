/**
 * Mail Axis Classifier
 * Hybrid keyword + reasoning-service classification of email threads along
 * independent business axes.
 */

import { createArbitrationProvider } from './arbitration';
import { MultiAxisOrchestrator } from './classification';
import { createAxisRegistry, settingsFromConfig } from './config/classification';

export * from './classification';
export * from './arbitration';
export * from './errors';
export { config } from './config';
export type { AppConfig } from './config';
export {
  createAxisRegistry,
  orchestratorSettingsSchema,
  resolveOrchestratorSettings,
  settingsFromConfig,
} from './config/classification';
export type { OrchestratorSettings, OrchestratorSettingsInput } from './config/classification';
export { ClaudeClientService } from './services/ClaudeClientService';
export type { ClaudeClientOptions, ClaudeUsageStats } from './services/ClaudeClientService';

/**
 * Orchestrator wired from the environment: keyword file, settings and
 * arbitration provider.
 */
export function createClassifier(): MultiAxisOrchestrator {
  return new MultiAxisOrchestrator({
    registry: createAxisRegistry(),
    provider: createArbitrationProvider(),
    settings: settingsFromConfig(),
  });
}
