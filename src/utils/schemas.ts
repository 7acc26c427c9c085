/**
 * Zod Schema 定义 - LLM 输出与配置验证
 * @version 1.0.0
 */

import { z } from 'zod';
import { ALL_INTENT_CATEGORIES, BaseLLM, IntentCategory } from '../types';

/**
 * 意图分类 oracle 输出 Schema
 * category 保留为字符串，由 parseIntentCategory 校验是否在允许集合内
 */
export const IntentOracleOutputSchema = z.object({
    category: z.string().describe('意图类别'),
    // 只接受数字或数字字符串；true / null / "" / [] 视为协议错误
    confidence: z
        .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
        .pipe(z.number().finite())
        .describe('置信度 0.0-1.0'),
    reasoning: z.string().describe('分类理由'),
    entities: z.record(z.unknown()).default({}).describe('抽取的实体'),
    follow_up_needed: z.boolean().default(false),
    context_dependent: z.boolean().default(false),
    suggested_actions: z.array(z.string()).default([]),
});

export type IntentOracleOutput = z.infer<typeof IntentOracleOutputSchema>;

/**
 * 轮次/会话元数据 Schema（持久化为 JSON 对象）
 */
export const MetadataSchema = z.record(z.unknown());

/**
 * 关键词表 Schema
 */
export const KeywordTableSchema = z.object({
    version: z.string().min(1),
    priority: z.array(z.nativeEnum(IntentCategory)).min(1),
    keywords: z.record(z.nativeEnum(IntentCategory), z.array(z.string().min(1))),
});

function isBaseLLM(value: unknown): value is BaseLLM {
    return typeof value === 'object' && value !== null && 'generate' in value && typeof value.generate === 'function';
}

const BaseLLMSchema = z.custom<BaseLLM>(isBaseLLM, { message: 'must implement generate(request)' });

/** setTimeout 可接受的最大延迟，超过后会立即触发 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * 引擎配置 Schema（含默认值）
 */
export const EngineConfigSchema = z.object({
    storage: z.object({
        sqlitePath: z.string().trim().min(1, 'storage.sqlitePath is required'),
        busyTimeoutMs: z.number().int().nonnegative().default(5000),
    }),
    llm: z.object({
        classifier: BaseLLMSchema,
        generator: BaseLLMSchema.optional(),
    }),
    intent: z
        .object({
            categories: z.array(z.nativeEnum(IntentCategory)).min(1).default([...ALL_INTENT_CATEGORIES]),
            confidenceThreshold: z.number().min(0).max(1).default(0.7),
            keywordTable: KeywordTableSchema.optional(),
        })
        .default({}),
    retention: z
        .object({
            maxTurnsPerSession: z.number().int().min(1).default(100),
        })
        .default({}),
    contextWindow: z
        .object({
            maxTurns: z.number().int().nonnegative().default(20),
            maxChars: z.number().int().nonnegative().default(4000),
        })
        .default({}),
    oracle: z
        .object({
            timeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(30000),
        })
        .default({}),
    commit: z
        .object({
            maxRetries: z.number().int().nonnegative().default(3),
            retryDelayMs: z.number().int().nonnegative().default(50),
        })
        .default({}),
});

export type ParsedEngineConfig = z.infer<typeof EngineConfigSchema>;

export const MAX_INPUT_LENGTH = 10000;
export const MAX_SESSION_ID_LENGTH = 100;

/**
 * 用户输入 Schema
 */
export const UserInputSchema = z
    .string()
    .refine((text) => text.trim().length > 0, 'Input cannot be empty')
    .refine((text) => text.length <= MAX_INPUT_LENGTH, `Input exceeds maximum length of ${MAX_INPUT_LENGTH} characters`)
    .refine((text) => !/[\x00-\x02]/.test(text), 'Input contains invalid control characters');

/**
 * 会话 ID Schema（UUID 也满足该字符集）
 */
export const SessionIdSchema = z
    .string()
    .min(1, 'Session ID cannot be empty')
    .max(MAX_SESSION_ID_LENGTH, `Session ID exceeds maximum length of ${MAX_SESSION_ID_LENGTH} characters`)
    .regex(/^[a-zA-Z0-9_-]+$/, 'Session ID must be a UUID or contain only letters, digits, hyphens and underscores');
