/**
 * Claude Arbitration Provider
 * Sends arbitration prompts to Claude and returns the trimmed answer.
 */

import { ArbitrationError } from '../errors';
import { ClaudeClientService } from '../services/ClaudeClientService';
import { ArbitrationProvider } from './ArbitrationProvider';

const SYSTEM_PROMPT =
  'You classify business emails. Answer with a single label taken from the list you are given, or AUCUN. Never explain.';

export class ClaudeArbitrationProvider implements ArbitrationProvider {
  readonly name = 'claude';
  readonly available = true;

  constructor(private readonly client: ClaudeClientService) {}

  async arbitrate(prompt: string): Promise<string> {
    const response = await this.client.sendMessage(prompt, { systemPrompt: SYSTEM_PROMPT });
    const answer = response.content.trim();

    if (!answer) {
      throw ArbitrationError.emptyResponse(this.name);
    }

    return answer;
  }
}
