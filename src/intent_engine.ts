import { IntentCategory, IntentEngineConfig, IntentResult, ResolvedEngineConfig, RetentionPolicy } from './types';
import { SessionRecord, StoreSummary, Turn } from './types/session';
import { ISessionStore } from './interfaces/store';
import { SQLiteSessionStore } from './storage/sqlite';
import { FallbackClassifier } from './core/fallback_classifier';
import { IntentClassifier } from './core/intent_classifier';
import { ResponseGenerator } from './core/generator';
import { ContextWindowBuilder } from './core/context_window';
import { ConversationOrchestrator, ProcessOptions, ProcessResult, TurnOutcome } from './core/orchestrator';
import { resolveConfig } from './utils/config';
import { validateSessionId, validateUserInput } from './utils/validators';

export const ENGINE_VERSION = '1.0.0';

export interface EngineStatus {
    version: string;
    supportedIntents: IntentCategory[];
    keywordTableVersion: string;
    config: {
        sqlitePath: string;
        confidenceThreshold: number;
        retention: RetentionPolicy;
        contextWindow: { maxTurns: number; maxChars: number };
        oracleTimeoutMs: number;
        commit: { maxRetries: number; retryDelayMs: number };
    };
    summary: StoreSummary;
}

export interface IntentEngineDependencies {
    /** 替换默认的 SQLite 存储（测试或自定义后端） */
    store?: ISessionStore;
}

export class IntentEngine {
    public readonly orchestrator: ConversationOrchestrator;
    private config: ResolvedEngineConfig;
    private store: ISessionStore;
    private fallback: FallbackClassifier;
    private classifier: IntentClassifier;
    private contextBuilder: ContextWindowBuilder;

    constructor(config: IntentEngineConfig, dependencies: IntentEngineDependencies = {}) {
        // Validate configuration before opening anything
        this.config = resolveConfig(config);
        const { storage, llm, intent, retention, contextWindow, oracle, commit } = this.config;

        this.fallback = new FallbackClassifier(intent.keywordTable, intent.categories);
        this.classifier = new IntentClassifier({
            llm: llm.classifier,
            fallback: this.fallback,
            categories: intent.categories,
            confidenceThreshold: intent.confidenceThreshold,
            timeoutMs: oracle.timeoutMs,
        });

        this.store =
            dependencies.store ??
            new SQLiteSessionStore(storage.sqlitePath, { retention, busyTimeoutMs: storage.busyTimeoutMs });
        this.contextBuilder = new ContextWindowBuilder(this.store);

        this.orchestrator = new ConversationOrchestrator({
            store: this.store,
            contextBuilder: this.contextBuilder,
            classifier: this.classifier,
            generator: new ResponseGenerator({ llm: llm.generator, timeoutMs: oracle.timeoutMs }),
            contextWindow,
            commit,
        });

        console.log(`[IntentEngine] Initialized (keywords ${this.fallback.version}, ${intent.categories.length} intents)`);
    }

    /**
     * 处理一轮输入，失败时返回 success = false 的结果
     */
    process(text: string, sessionId?: string, options: Omit<ProcessOptions, 'sessionId'> = {}): Promise<ProcessResult> {
        return this.orchestrator.process(text, { ...options, sessionId });
    }

    /**
     * 处理一轮输入，失败时抛出类型化错误
     */
    processTurn(text: string, sessionId?: string, options: Omit<ProcessOptions, 'sessionId'> = {}): Promise<TurnOutcome> {
        return this.orchestrator.processTurn(text, { ...options, sessionId });
    }

    /**
     * 仅分类，不写入会话
     */
    async analyze(text: string, sessionId?: string, signal?: AbortSignal): Promise<IntentResult> {
        validateUserInput(text);
        let context: Turn[] = [];
        if (sessionId !== undefined) {
            validateSessionId(sessionId);
            context = await this.contextBuilder.build(
                sessionId,
                this.config.contextWindow.maxTurns,
                this.config.contextWindow.maxChars
            );
        }
        return this.classifier.classify(text, context, signal);
    }

    async history(sessionId: string): Promise<Turn[]> {
        return this.store.readAll(validateSessionId(sessionId));
    }

    async sessions(): Promise<SessionRecord[]> {
        return this.store.listSessions();
    }

    async getSession(sessionId: string): Promise<SessionRecord | null> {
        return this.store.getSession(validateSessionId(sessionId));
    }

    async deleteSession(sessionId: string): Promise<boolean> {
        return this.store.deleteSession(validateSessionId(sessionId));
    }

    async clearSession(sessionId: string): Promise<number> {
        return this.store.clearSession(validateSessionId(sessionId));
    }

    async getStatus(): Promise<EngineStatus> {
        const { storage, intent, retention, contextWindow, oracle, commit } = this.config;
        return {
            version: ENGINE_VERSION,
            supportedIntents: [...intent.categories],
            keywordTableVersion: this.fallback.version,
            config: {
                sqlitePath: storage.sqlitePath,
                confidenceThreshold: intent.confidenceThreshold,
                retention: { ...retention },
                contextWindow: { ...contextWindow },
                oracleTimeoutMs: oracle.timeoutMs,
                commit: { ...commit },
            },
            summary: await this.store.getSummary(),
        };
    }

    async close(): Promise<void> {
        const errors: Error[] = [];

        try {
            if (this.store instanceof SQLiteSessionStore) {
                await this.store.closeAfterPendingWrites();
            } else {
                this.store.close();
            }
        } catch (error) {
            errors.push(error instanceof Error ? error : new Error(String(error)));
        }

        // Cleanup event listeners
        try {
            this.orchestrator.removeAllListeners();
        } catch (error) {
            errors.push(error instanceof Error ? error : new Error(String(error)));
        }

        if (errors.length > 0) {
            console.warn('[IntentEngine] Some resources failed to close:', errors);
        }

        console.log('[IntentEngine] Closed');
    }
}
