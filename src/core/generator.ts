/**
 * ResponseGenerator - 按意图生成回复
 * @version 1.0.0
 */

import { BaseLLM, IntentResult, LLMUsage } from '../types';
import { Turn } from '../types/session';
import { buildResponseMessages, buildResponseSystemPrompt, getDegradedResponse } from '../prompts/response';
import { withTimeout } from '../utils/helpers';
import { CancelledError, IntentEngineError, OracleUnavailableError } from '../utils/errors';

export const GENERATOR_TEMPERATURE = 0.3;
export const GENERATOR_MAX_TOKENS = 1500;

/**
 * ResponseGenerator 配置
 */
export interface ResponseGeneratorConfig {
    /** 生成 oracle */
    llm: BaseLLM;

    /** oracle 调用超时 (ms)，默认 30000 */
    timeoutMs?: number;
}

export interface GeneratedResponse {
    text: string;

    /** true 表示使用了固定的降级回复 */
    degraded: boolean;

    /** 降级原因（错误码或 EMPTY_RESPONSE） */
    degradedReason?: string;

    usage?: LLMUsage;
    model?: string;
}

export class ResponseGenerator {
    private llm: BaseLLM;
    private timeoutMs: number;

    constructor(config: ResponseGeneratorConfig) {
        this.llm = config.llm;
        this.timeoutMs = config.timeoutMs ?? 30000;
    }

    /**
     * 生成回复。oracle 失败、超时或返回空文本时使用降级回复
     * @throws {CancelledError} 外部取消
     */
    async generate(
        text: string,
        intent: IntentResult,
        history: readonly Turn[],
        signal?: AbortSignal
    ): Promise<GeneratedResponse> {
        try {
            const response = await withTimeout(
                (taskSignal) =>
                    this.llm.generate({
                        system: buildResponseSystemPrompt(intent),
                        messages: buildResponseMessages(history, text),
                        temperature: GENERATOR_TEMPERATURE,
                        maxTokens: GENERATOR_MAX_TOKENS,
                        signal: taskSignal,
                    }),
                this.timeoutMs,
                {
                    signal,
                    onTimeout: () =>
                        new OracleUnavailableError(`Response oracle timed out after ${this.timeoutMs}ms`, this.timeoutMs),
                }
            );

            const content = response.text.trim();
            if (!content) {
                return this.degrade(intent, 'EMPTY_RESPONSE', 'Response oracle returned empty output');
            }

            return { text: content, degraded: false, usage: response.usage, model: response.model };
        } catch (error) {
            if (error instanceof CancelledError) {
                throw error;
            }
            const reason = error instanceof IntentEngineError ? error.code : 'ORACLE_UNAVAILABLE';
            return this.degrade(intent, reason, error instanceof Error ? error.message : String(error));
        }
    }

    private degrade(intent: IntentResult, reason: string, message: string): GeneratedResponse {
        console.warn(`[ResponseGenerator] Using degraded response for ${intent.category} (${reason}): ${message}`);
        return { text: getDegradedResponse(intent.category), degraded: true, degradedReason: reason };
    }
}
