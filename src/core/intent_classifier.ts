/**
 * IntentClassifier - 基于 oracle 的意图分类，失败时回退到关键词分类
 * @version 1.0.0
 */

import { BaseLLM, IntentCategory, IntentResult, LLMResponse, parseIntentCategory } from '../types';
import { Turn } from '../types/session';
import { FallbackClassifier, FALLBACK_CONFIDENCE } from './fallback_classifier';
import { buildIntentSystemPrompt, buildIntentUserMessage } from '../prompts/intent';
import { IntentOracleOutputSchema } from '../utils/schemas';
import { safeParseJSON, throwIfCancelled, withTimeout } from '../utils/helpers';
import {
    CancelledError,
    ClassificationFailedError,
    ConfigurationError,
    IntentEngineError,
    OracleProtocolError,
    OracleUnavailableError,
} from '../utils/errors';

export const CLASSIFIER_TEMPERATURE = 0.1;
export const CLASSIFIER_MAX_TOKENS = 500;

/**
 * IntentClassifier 配置
 */
export interface IntentClassifierConfig {
    /** 分类 oracle */
    llm: BaseLLM;

    fallback: FallbackClassifier;

    /** 允许的类别集合 */
    categories: readonly IntentCategory[];

    /** 低于该值的 oracle 结果标记为 lowConfidence */
    confidenceThreshold: number;

    /** oracle 调用超时 (ms)，默认 30000 */
    timeoutMs?: number;
}

function clamp(value: number): number {
    return Math.min(1, Math.max(0, value));
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class IntentClassifier {
    private llm: BaseLLM;
    private fallback: FallbackClassifier;
    private categories: readonly IntentCategory[];
    private confidenceThreshold: number;
    private timeoutMs: number;
    private systemPrompt: string;

    constructor(config: IntentClassifierConfig) {
        if (config.categories.length === 0) {
            throw new ConfigurationError('At least one intent category is required', 'intent.categories');
        }
        if (
            !Number.isFinite(config.confidenceThreshold) ||
            config.confidenceThreshold <= FALLBACK_CONFIDENCE ||
            config.confidenceThreshold > 1
        ) {
            throw new ConfigurationError(
                `confidenceThreshold must be in (${FALLBACK_CONFIDENCE}, 1]`,
                'intent.confidenceThreshold'
            );
        }

        this.llm = config.llm;
        this.fallback = config.fallback;
        this.categories = Object.freeze([...config.categories]);
        this.confidenceThreshold = config.confidenceThreshold;
        this.timeoutMs = config.timeoutMs ?? 30000;
        this.systemPrompt = buildIntentSystemPrompt(this.categories);
    }

    /**
     * 分类一条输入
     * oracle 不可用或响应无效时使用 fallback；取消信号以 CancelledError 抛出
     * @throws {ClassificationFailedError} fallback 本身失败
     */
    async classify(text: string, context: readonly Turn[], signal?: AbortSignal): Promise<IntentResult> {
        throwIfCancelled(signal);
        const startTime = Date.now();

        try {
            const response = await this.callOracle(text, context, signal);
            const result = this.parseOracleResponse(response);
            return { ...result, processingTimeMs: Date.now() - startTime };
        } catch (error) {
            if (error instanceof CancelledError) {
                throw error;
            }
            const reason = error instanceof IntentEngineError ? error.code : 'ORACLE_UNAVAILABLE';
            console.warn(`[IntentClassifier] Falling back to keyword classification (${reason}): ${describe(error)}`);
            return this.classifyWithFallback(text, reason, startTime);
        }
    }

    private async callOracle(text: string, context: readonly Turn[], signal?: AbortSignal): Promise<LLMResponse> {
        try {
            return await withTimeout(
                (taskSignal) =>
                    this.llm.generate({
                        system: this.systemPrompt,
                        messages: [{ role: 'user', content: buildIntentUserMessage(text, context) }],
                        temperature: CLASSIFIER_TEMPERATURE,
                        maxTokens: CLASSIFIER_MAX_TOKENS,
                        signal: taskSignal,
                    }),
                this.timeoutMs,
                {
                    signal,
                    onTimeout: () =>
                        new OracleUnavailableError(`Intent oracle timed out after ${this.timeoutMs}ms`, this.timeoutMs),
                }
            );
        } catch (error) {
            if (
                error instanceof CancelledError ||
                error instanceof OracleUnavailableError ||
                error instanceof OracleProtocolError
            ) {
                throw error;
            }
            // 其他异常一律视为传输失败
            throw new OracleUnavailableError(`Intent oracle call failed: ${describe(error)}`);
        }
    }

    private parseOracleResponse(response: LLMResponse): IntentResult {
        let raw: unknown;
        try {
            raw = safeParseJSON(response.text);
        } catch (error) {
            throw new OracleProtocolError(`Intent oracle returned malformed JSON: ${describe(error)}`, response.text);
        }

        const parsed = IntentOracleOutputSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new OracleProtocolError(
                `Intent oracle output is invalid at ${issue.path.join('.') || '<root>'}: ${issue.message}`,
                response.text
            );
        }

        const output = parsed.data;
        const category = parseIntentCategory(output.category, this.categories);
        if (category === 'unknown') {
            throw new OracleProtocolError(`Intent oracle returned an unsupported category: ${output.category}`, response.text);
        }

        const confidence = clamp(output.confidence);

        return {
            category,
            confidence,
            reasoning: output.reasoning,
            entities: output.entities,
            followUpNeeded: output.follow_up_needed,
            contextDependent: output.context_dependent,
            suggestedActions: output.suggested_actions,
            source: 'oracle',
            lowConfidence: confidence < this.confidenceThreshold,
            model: response.model,
        };
    }

    private classifyWithFallback(text: string, reason: string, startTime: number): IntentResult {
        try {
            const result = this.fallback.classify(text);
            return { ...result, fallbackReason: reason, processingTimeMs: Date.now() - startTime };
        } catch (error) {
            throw new ClassificationFailedError(`Fallback classification failed: ${describe(error)}`, text, error);
        }
    }
}
