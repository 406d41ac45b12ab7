/**
 * lats-search: Language Agent Tree Search for coding agents
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, LatsSearchEngine } from 'lats-search';
 *
 * const config = new ConfigManager(process.cwd()).load();
 * const engine = LatsSearchEngine.fromConfig(config, { executor, scorer });
 * const result = await engine.search('fix the off-by-one in pagination');
 * ```
 */

// Core
export { ConfigManager, createMCTSConfig } from './core/config.js';
export { SearchEventEmitter } from './core/events.js';
export { getLogger, setLogger, createLogger } from './core/logger.js';
export {
  LatsError,
  ConfigError,
  ExecutorError,
  ExpansionError,
  PersistenceError,
  WinningPathParseError,
  toError,
} from './core/errors.js';
export { MCTSConfigSchema, LatsConfigSchema } from './core/types.js';
export type { MCTSConfig, MCTSConfigInput, LatsConfig, LatsConfigInput } from './core/types.js';

// Providers
export type { LLMProvider, LLMRequest, LLMResponse, LLMMessage } from './providers/types.js';

// Cost
export * from './cost/index.js';

// Reasoning
export * from './reasoning/index.js';

// Memory
export * from './memory/index.js';

// Version
export { VERSION, NAME } from './version.js';
