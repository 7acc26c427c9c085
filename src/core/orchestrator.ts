/**
 * ConversationOrchestrator - 单轮对话调度器
 * @version 1.0.0
 */

import EventEmitter from 'eventemitter3';
import { IntentCategory, IntentResult, IntentSource } from '../types';
import { NewTurn, Turn } from '../types/session';
import { ISessionStore } from '../interfaces/store';
import { ContextWindowBuilder } from './context_window';
import { IntentClassifier } from './intent_classifier';
import { GeneratedResponse, ResponseGenerator } from './generator';
import { generateId, retry, throwIfCancelled } from '../utils/helpers';
import { validateSessionId, validateUserInput } from '../utils/validators';
import {
    CancelledError,
    ClassificationFailedError,
    IntentEngineError,
    PartialCommitError,
    StorageError,
} from '../utils/errors';

/**
 * 单轮处理状态
 */
export enum TurnState {
    RECEIVED = 'RECEIVED',
    CONTEXT_BUILT = 'CONTEXT_BUILT',
    CLASSIFIED = 'CLASSIFIED',
    GENERATED = 'GENERATED',
    COMMITTED = 'COMMITTED',
    FAILED = 'FAILED',
    CANCELLED = 'CANCELLED',
}

export interface TransitionEvent {
    requestId: string;
    sessionId: string;
    from: TurnState | null;
    to: TurnState;
    reason?: string;
}

export interface DegradedEvent {
    requestId: string;
    sessionId: string;
    category: IntentCategory;
    reason: string;
}

export interface OrchestratorEvents {
    transition: (event: TransitionEvent) => void;
    degraded: (event: DegradedEvent) => void;
}

/**
 * ConversationOrchestrator 配置
 */
export interface OrchestratorConfig {
    store: ISessionStore;
    contextBuilder: ContextWindowBuilder;
    classifier: IntentClassifier;
    generator: ResponseGenerator;

    contextWindow: {
        maxTurns: number;
        maxChars: number;
    };

    commit: {
        /** 瞬时存储错误的重试次数 */
        maxRetries: number;
        retryDelayMs: number;
    };
}

export interface ProcessOptions {
    /** 缺省时生成新的 UUID */
    sessionId?: string;

    /** 提交开始前有效 */
    signal?: AbortSignal;

    requestId?: string;

    /** 会话首次写入时保存的会话元数据（如名称） */
    sessionMetadata?: Record<string, unknown>;
}

/**
 * 成功提交的一轮
 */
export interface TurnOutcome {
    requestId: string;
    sessionId: string;
    response: string;
    intent: IntentResult;
    degraded: boolean;
    humanSequence: number;
    assistantSequence: number;
    processingTimeMs: number;
}

export interface ProcessError {
    code: string;
    message: string;
    details: Record<string, unknown>;
}

/**
 * 对外结果对象，失败时 success = false 并带稳定的 error.code
 */
export interface ProcessResult {
    success: boolean;
    response: string | null;
    intent: IntentCategory | null;
    confidence: number | null;
    reasoning: string | null;
    sessionId: string;
    requestId: string;
    degraded: boolean;
    lowConfidence: boolean;
    source: IntentSource | null;
    processingTimeMs: number;
    error?: ProcessError;
    rawInput?: string;
}

interface TurnContext {
    requestId: string;
    sessionId: string;
    sessionMetadata?: Record<string, unknown>;
    state: TurnState | null;
}

function toProcessError(error: unknown): ProcessError {
    if (error instanceof IntentEngineError) {
        return error.toJSON();
    }
    return {
        code: 'INTERNAL_ERROR',
        message: error instanceof Error ? error.message : String(error),
        details: {},
    };
}

/**
 * ConversationOrchestrator
 *
 * RECEIVED → CONTEXT_BUILT → CLASSIFIED → GENERATED → COMMITTED
 * 任一步骤失败进入 FAILED，提交前取消进入 CANCELLED
 *
 * 事件：
 * - 'transition': (event: TransitionEvent) => void - 状态迁移
 * - 'degraded': (event: DegradedEvent) => void - 使用了降级回复
 */
export class ConversationOrchestrator extends EventEmitter<OrchestratorEvents> {
    private store: ISessionStore;
    private contextBuilder: ContextWindowBuilder;
    private classifier: IntentClassifier;
    private generator: ResponseGenerator;
    private contextWindow: OrchestratorConfig['contextWindow'];
    private commitPolicy: OrchestratorConfig['commit'];

    constructor(config: OrchestratorConfig) {
        super();

        this.store = config.store;
        this.contextBuilder = config.contextBuilder;
        this.classifier = config.classifier;
        this.generator = config.generator;
        this.contextWindow = config.contextWindow;
        this.commitPolicy = config.commit;
    }

    /**
     * 处理一轮输入，失败时抛出类型化错误
     * @throws {ValidationError | ClassificationFailedError | StorageError | PartialCommitError | CancelledError}
     */
    async processTurn(text: string, options: ProcessOptions = {}): Promise<TurnOutcome> {
        const startTime = Date.now();
        const ctx: TurnContext = {
            requestId: options.requestId ?? generateId(),
            sessionId: options.sessionId ?? generateId(),
            sessionMetadata: options.sessionMetadata,
            state: null,
        };
        const { signal } = options;

        this.transition(ctx, TurnState.RECEIVED);

        try {
            validateUserInput(text);
            validateSessionId(ctx.sessionId);

            throwIfCancelled(signal);
            const history = await this.contextBuilder.build(
                ctx.sessionId,
                this.contextWindow.maxTurns,
                this.contextWindow.maxChars
            );
            this.transition(ctx, TurnState.CONTEXT_BUILT);

            throwIfCancelled(signal);
            const intent = await this.classify(text, history, signal);
            this.transition(ctx, TurnState.CLASSIFIED);

            throwIfCancelled(signal);
            const generated = await this.generator.generate(text, intent, history, signal);
            if (generated.degraded) {
                this.emit('degraded', {
                    requestId: ctx.requestId,
                    sessionId: ctx.sessionId,
                    category: intent.category,
                    reason: generated.degradedReason ?? 'UNKNOWN',
                });
            }
            this.transition(ctx, TurnState.GENERATED);

            // 提交开始后不再响应取消
            throwIfCancelled(signal);
            const { humanSequence, assistantSequence } = await this.commit(ctx, text, intent, generated);
            this.transition(ctx, TurnState.COMMITTED);

            return {
                requestId: ctx.requestId,
                sessionId: ctx.sessionId,
                response: generated.text,
                intent,
                degraded: generated.degraded,
                humanSequence,
                assistantSequence,
                processingTimeMs: Date.now() - startTime,
            };
        } catch (error) {
            if (error instanceof CancelledError) {
                this.transition(ctx, TurnState.CANCELLED, error.code);
            } else {
                const { code } = toProcessError(error);
                this.transition(ctx, TurnState.FAILED, code);
            }
            throw error;
        }
    }

    /**
     * 处理一轮输入并返回结果对象（不抛出）
     */
    async process(text: string, options: ProcessOptions = {}): Promise<ProcessResult> {
        const startTime = Date.now();
        const requestId = options.requestId ?? generateId();
        const sessionId = options.sessionId ?? generateId();

        try {
            const outcome = await this.processTurn(text, { ...options, requestId, sessionId });
            console.log(
                `[ConversationOrchestrator] Processed ${requestId}: ${outcome.intent.category} ` +
                    `(confidence: ${outcome.intent.confidence.toFixed(2)}, time: ${outcome.processingTimeMs}ms)`
            );
            return {
                success: true,
                response: outcome.response,
                intent: outcome.intent.category,
                confidence: outcome.intent.confidence,
                reasoning: outcome.intent.reasoning,
                sessionId,
                requestId,
                degraded: outcome.degraded,
                lowConfidence: outcome.intent.lowConfidence,
                source: outcome.intent.source,
                processingTimeMs: outcome.processingTimeMs,
            };
        } catch (error) {
            const processError = toProcessError(error);
            console.error(`[ConversationOrchestrator] Request ${requestId} failed (${processError.code}): ${processError.message}`);
            const result: ProcessResult = {
                success: false,
                response: null,
                intent: null,
                confidence: null,
                reasoning: null,
                sessionId,
                requestId,
                degraded: false,
                lowConfidence: false,
                source: null,
                processingTimeMs: Date.now() - startTime,
                error: processError,
            };
            if (error instanceof ClassificationFailedError) {
                result.rawInput = error.rawInput;
            }
            return result;
        }
    }

    private async classify(text: string, history: readonly Turn[], signal?: AbortSignal): Promise<IntentResult> {
        try {
            return await this.classifier.classify(text, history, signal);
        } catch (error) {
            if (error instanceof CancelledError || error instanceof ClassificationFailedError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new ClassificationFailedError(`Classification failed: ${message}`, text, error);
        }
    }

    /**
     * 依次写入 human 与 assistant 轮次
     */
    private async commit(
        ctx: TurnContext,
        text: string,
        intent: IntentResult,
        generated: GeneratedResponse
    ): Promise<{ humanSequence: number; assistantSequence: number }> {
        const humanTurn: NewTurn = {
            role: 'human',
            content: text,
            intent: intent.category,
            confidence: intent.confidence,
            metadata: {
                requestId: ctx.requestId,
                reasoning: intent.reasoning,
                entities: intent.entities,
                followUpNeeded: intent.followUpNeeded,
                contextDependent: intent.contextDependent,
                suggestedActions: intent.suggestedActions,
                source: intent.source,
                lowConfidence: intent.lowConfidence,
                fallbackReason: intent.fallbackReason,
                model: intent.model,
            },
        };
        const humanSequence = await this.appendWithRetry(ctx.sessionId, humanTurn, ctx.sessionMetadata);

        try {
            const assistantSequence = await this.appendWithRetry(ctx.sessionId, {
                role: 'assistant',
                content: generated.text,
                metadata: {
                    requestId: ctx.requestId,
                    replyTo: humanSequence,
                    degraded: generated.degraded,
                    degradedReason: generated.degradedReason,
                    usage: generated.usage,
                    model: generated.model,
                },
            });
            return { humanSequence, assistantSequence };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new PartialCommitError(
                `Assistant turn for ${ctx.sessionId}#${humanSequence} was not recorded: ${message}`,
                ctx.sessionId,
                humanSequence,
                'assistant',
                error
            );
        }
    }

    private appendWithRetry(sessionId: string, turn: NewTurn, sessionMetadata?: Record<string, unknown>): Promise<number> {
        return retry(() => this.store.append(sessionId, turn, sessionMetadata), {
            maxAttempts: this.commitPolicy.maxRetries + 1,
            delayMs: this.commitPolicy.retryDelayMs,
            shouldRetry: (error) => error instanceof StorageError && error.transient,
            onRetry: (error, attempt) => {
                console.warn(`[ConversationOrchestrator] Retrying ${turn.role} append for ${sessionId} (attempt ${attempt}): ${error.message}`);
            },
        });
    }

    private transition(ctx: TurnContext, to: TurnState, reason?: string): void {
        const event: TransitionEvent = { requestId: ctx.requestId, sessionId: ctx.sessionId, from: ctx.state, to };
        if (reason !== undefined) {
            event.reason = reason;
        }
        ctx.state = to;
        this.emit('transition', event);
    }
}
