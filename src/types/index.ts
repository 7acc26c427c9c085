/**
 * Intent Engine Core - Type Definitions
 */

// --- Enums ---

export enum IntentCategory {
    GENERAL_CHAT = 'general_chat',
    QUESTION_ANSWERING = 'question_answering',
    TASK_REQUEST = 'task_request',
    INFORMATION_SEEKING = 'information_seeking',
    CLARIFICATION = 'clarification',
    GREETING = 'greeting',
    GOODBYE = 'goodbye',
}

export const ALL_INTENT_CATEGORIES: readonly IntentCategory[] = Object.freeze(Object.values(IntentCategory));

export const INTENT_DESCRIPTIONS: Readonly<Record<IntentCategory, string>> = Object.freeze({
    [IntentCategory.GENERAL_CHAT]: 'Casual conversation and small talk',
    [IntentCategory.QUESTION_ANSWERING]: 'Direct factual questions seeking specific answers',
    [IntentCategory.TASK_REQUEST]: 'Requests to perform specific actions or tasks',
    [IntentCategory.INFORMATION_SEEKING]: 'Looking for information on particular topics',
    [IntentCategory.CLARIFICATION]: 'Asking for clarification or explanation of previous content',
    [IntentCategory.GREETING]: 'Greetings, introductions, and conversation starters',
    [IntentCategory.GOODBYE]: 'Farewells, conversation endings, and sign-offs',
});

/**
 * 类别解析结果。'unknown' 表示 oracle 给出的类别不在允许集合内，必须走 fallback
 */
export type ParsedCategory = IntentCategory | 'unknown';

export function parseIntentCategory(
    raw: unknown,
    allowed: readonly IntentCategory[] = ALL_INTENT_CATEGORIES
): ParsedCategory {
    if (typeof raw !== 'string') {
        return 'unknown';
    }
    const normalized = raw.trim().toLowerCase();
    return allowed.find((category) => category === normalized) ?? 'unknown';
}

// --- Intent ---

export type IntentSource = 'oracle' | 'fallback';

export interface IntentResult {
    category: IntentCategory;

    /** 0.0 - 1.0 */
    confidence: number;

    /** Advisory only */
    reasoning: string;

    entities: Record<string, unknown>;
    followUpNeeded: boolean;
    contextDependent: boolean;
    suggestedActions: string[];

    source: IntentSource;

    /** Oracle-derived result below the confidence threshold. Always false for fallback results */
    lowConfidence: boolean;

    /** Why the fallback classifier ran (error code), when it did */
    fallbackReason?: string;

    model?: string;
    processingTimeMs?: number;
}

/**
 * 关键词表快照（不可变，整体替换）
 */
export interface KeywordTable {
    version: string;

    /** Tie-break order when two categories match at the same position */
    priority: readonly IntentCategory[];

    /** Ordered trigger phrases per category, matched case-insensitively as substrings */
    keywords: Partial<Record<IntentCategory, readonly string[]>>;
}

// --- Oracle ---

export interface ChatMessage {
    role: 'user' | 'assistant';
    content: string;
}

export interface LLMRequest {
    system: string;
    messages: ChatMessage[];
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface LLMUsage {
    promptTokens?: number;
    completionTokens?: number;
    totalTokens?: number;
}

export interface LLMResponse {
    text: string;
    usage?: LLMUsage;
    model?: string;
}

/**
 * LLM 提供者接口
 * 实现可以抛出 OracleUnavailableError / OracleProtocolError；其他异常一律视为传输失败
 */
export interface BaseLLM {
    generate(request: LLMRequest): Promise<LLMResponse>;
}

// --- Configuration ---

export interface IntentStorageConfig {
    sqlitePath: string;
    busyTimeoutMs?: number; // Default: 5000ms
}

export interface IntentLLMConfig {
    classifier: BaseLLM;
    generator?: BaseLLM; // Default: classifier driver
}

export interface IntentClassificationConfig {
    categories?: IntentCategory[]; // Default: all categories
    confidenceThreshold?: number; // Default: 0.7
    keywordTable?: KeywordTable; // Default: bundled table
}

export interface RetentionPolicy {
    maxTurnsPerSession: number;
}

export interface IntentContextWindowConfig {
    maxTurns?: number; // Default: 20
    maxChars?: number; // Default: 4000
}

export interface IntentOracleConfig {
    timeoutMs?: number; // Default: 30000ms
}

export interface IntentCommitConfig {
    maxRetries?: number; // Default: 3
    retryDelayMs?: number; // Default: 50ms
}

export interface IntentEngineConfig {
    storage: IntentStorageConfig;
    llm: IntentLLMConfig;
    intent?: IntentClassificationConfig;
    retention?: Partial<RetentionPolicy>;
    contextWindow?: IntentContextWindowConfig;
    oracle?: IntentOracleConfig;
    commit?: IntentCommitConfig;
}

export interface ResolvedEngineConfig {
    storage: Required<IntentStorageConfig>;
    llm: Required<IntentLLMConfig>;
    intent: {
        categories: readonly IntentCategory[];
        confidenceThreshold: number;
        keywordTable: KeywordTable;
    };
    retention: RetentionPolicy;
    contextWindow: Required<IntentContextWindowConfig>;
    oracle: Required<IntentOracleConfig>;
    commit: Required<IntentCommitConfig>;
}
