export { defaultConfigPath } from './config/ConfigLoader.js';
export { readStdin } from './context/StdinReader.js';
export { ConfigError, UsageError, describeError } from './errors.js';
export { OpenAIProvider } from './llm/OpenAIProvider.js';
export type { OrchestratorEvent } from './orchestrator/Events.js';
export { Orchestrator } from './orchestrator/Orchestrator.js';
export { DEFAULT_INPUT_TOKEN_BUDGET } from './prompts/truncate.js';
