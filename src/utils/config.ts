/**
 * 配置解析与验证
 */

import { IntentEngineConfig, ResolvedEngineConfig } from '../types';
import { EngineConfigSchema } from './schemas';
import { ConfigurationError } from './errors';
import { FALLBACK_CONFIDENCE, loadDefaultKeywordTable } from '../core/fallback_classifier';

/**
 * Apply defaults and validate configuration
 * @throws {ConfigurationError} if configuration is invalid
 */
export function resolveConfig(config: IntentEngineConfig): ResolvedEngineConfig {
    const parsed = EngineConfigSchema.safeParse(config);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue.path.join('.');
        throw new ConfigurationError(`Invalid configuration at ${field || '<root>'}: ${issue.message}`, field);
    }

    const { storage, llm, intent, retention, contextWindow, oracle, commit } = parsed.data;

    if (intent.confidenceThreshold <= FALLBACK_CONFIDENCE) {
        throw new ConfigurationError(
            `intent.confidenceThreshold must be above the fallback confidence (${FALLBACK_CONFIDENCE})`,
            'intent.confidenceThreshold'
        );
    }

    return Object.freeze({
        storage: Object.freeze({ ...storage }),
        llm: Object.freeze({
            classifier: llm.classifier,
            generator: llm.generator ?? llm.classifier,
        }),
        intent: Object.freeze({
            categories: Object.freeze([...new Set(intent.categories)]),
            confidenceThreshold: intent.confidenceThreshold,
            keywordTable: intent.keywordTable ?? loadDefaultKeywordTable(),
        }),
        retention: Object.freeze({ ...retention }),
        contextWindow: Object.freeze({ ...contextWindow }),
        oracle: Object.freeze({ ...oracle }),
        commit: Object.freeze({ ...commit }),
    });
}
