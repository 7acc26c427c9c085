/**
 * Intent Engine Core - Main Entry Point
 * @version 1.0.0
 */

export { IntentEngine, ENGINE_VERSION } from './intent_engine';
export type { EngineStatus, IntentEngineDependencies } from './intent_engine';
export * from './types';

// Export Error Types
export {
    IntentEngineError,
    ValidationError,
    StorageError,
    ConfigurationError,
    OracleUnavailableError,
    OracleProtocolError,
    ClassificationFailedError,
    PartialCommitError,
    CancelledError,
} from './utils/errors';

// Export Configuration Interfaces (explicitly listed for better discoverability)
export type {
    IntentEngineConfig,
    IntentStorageConfig,
    IntentLLMConfig,
    IntentClassificationConfig,
    IntentContextWindowConfig,
    IntentOracleConfig,
    IntentCommitConfig,
    RetentionPolicy,
} from './types';

export type { Turn, NewTurn, TurnRole, SessionRecord, StoreSummary } from './types/session';
export type { ISessionStore } from './interfaces/store';

// Components, for callers assembling their own pipeline
export { SQLiteSessionStore } from './storage/sqlite';
export type { SQLiteSessionStoreOptions } from './storage/sqlite';
export {
    FallbackClassifier,
    loadDefaultKeywordTable,
    FALLBACK_CONFIDENCE,
    FALLBACK_MIN_CONFIDENCE,
} from './core/fallback_classifier';
export { IntentClassifier } from './core/intent_classifier';
export type { IntentClassifierConfig } from './core/intent_classifier';
export { ResponseGenerator } from './core/generator';
export type { GeneratedResponse } from './core/generator';
export { ContextWindowBuilder } from './core/context_window';
export { ConversationOrchestrator, TurnState } from './core/orchestrator';
export type {
    OrchestratorConfig,
    ProcessOptions,
    ProcessResult,
    TurnOutcome,
    TransitionEvent,
    DegradedEvent,
} from './core/orchestrator';
export { resolveConfig } from './utils/config';
export { DEGRADED_RESPONSES } from './prompts/response';
