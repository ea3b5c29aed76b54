/**
 * Classifier Settings
 * Validated orchestrator settings and the registry factory, both resolved
 * from the environment by default.
 */

import { z } from 'zod';
import { AxisRegistry, defaultAxisRegistry, loadAxisRegistry } from '../classification/AxisRegistry';
import { ConfigurationError } from '../errors';
import { config } from './index';

export const orchestratorSettingsSchema = z.object({
  /** Labels below this confidence stay out of the flat category list */
  confidenceThreshold: z.number().min(0).default(0),
  /** Processing order; empty means the default order */
  axisOrder: z.array(z.string().min(1)).default([]),
});

export type OrchestratorSettings = z.infer<typeof orchestratorSettingsSchema>;
export type OrchestratorSettingsInput = z.input<typeof orchestratorSettingsSchema>;

/**
 * @throws ConfigurationError when a setting is out of range
 */
export function resolveOrchestratorSettings(input: unknown = {}): OrchestratorSettings {
  const parsed = orchestratorSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.invalidSettings(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return parsed.data;
}

export function settingsFromConfig(): OrchestratorSettings {
  return resolveOrchestratorSettings({
    confidenceThreshold: config.classification.confidenceThreshold,
    axisOrder: config.classification.axisOrder,
  });
}

/**
 * Registry from AXIS_KEYWORDS_PATH when set, else the bundled keyword data.
 */
export function createAxisRegistry(filePath = config.classification.axisKeywordsPath): AxisRegistry {
  return filePath ? loadAxisRegistry(filePath) : defaultAxisRegistry();
}
