import { config } from '../config';
import { ClaudeClientService } from '../services/ClaudeClientService';
import logger from '../utils/logger';
import { ArbitrationProvider, DisabledArbitrationProvider } from './ArbitrationProvider';
import { ClaudeArbitrationProvider } from './ClaudeArbitrationProvider';

export interface ArbitrationProviderSettings {
  useLlm: boolean;
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  retryAttempts?: number;
}

/**
 * Claude when enabled and a key is configured, otherwise the disabled provider.
 */
export function createArbitrationProvider(
  settings: ArbitrationProviderSettings = {
    useLlm: config.classification.useLlm,
    ...config.ai,
    apiKey: config.ai.anthropicApiKey,
  }
): ArbitrationProvider {
  if (!settings.useLlm) {
    logger.info('LLM arbitration disabled by configuration');
    return new DisabledArbitrationProvider();
  }

  if (!settings.apiKey) {
    logger.warn('Anthropic API key not configured - ambiguous axes will use heuristic fallback');
    return new DisabledArbitrationProvider();
  }

  const client = new ClaudeClientService({
    apiKey: settings.apiKey,
    model: settings.model,
    maxTokens: settings.maxTokens,
    temperature: settings.temperature,
    timeoutMs: settings.timeoutMs,
    retryAttempts: settings.retryAttempts,
  });
  return new ClaudeArbitrationProvider(client);
}
