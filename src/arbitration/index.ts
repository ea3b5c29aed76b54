export { DisabledArbitrationProvider } from './ArbitrationProvider';
export type { ArbitrationProvider } from './ArbitrationProvider';
export { ClaudeArbitrationProvider } from './ClaudeArbitrationProvider';
export { createArbitrationProvider } from './createArbitrationProvider';
export type { ArbitrationProviderSettings } from './createArbitrationProvider';
export {
  ARBITRATION_CONTEXT_LIMIT,
  NO_LABEL_SENTINEL,
  buildArbitrationPrompt,
  parseArbitrationResponse,
} from './arbitrationPrompt';
export type {
  ArbitrationPromptInput,
  ParsedArbitrationResponse,
  ResponseMatch,
} from './arbitrationPrompt';
export { requestArbitration } from './requestArbitration';
export type { ArbitrationOutcome } from './requestArbitration';
