/**
 * FallbackClassifier - 基于关键词的确定性意图分类
 * @version 1.0.0
 */

import defaultKeywords from '../data/intent_keywords.json';
import { ALL_INTENT_CATEGORIES, IntentCategory, IntentResult, KeywordTable } from '../types';
import { KeywordTableSchema } from '../utils/schemas';
import { ConfigurationError } from '../utils/errors';

/** Confidence of every keyword match; kept below the oracle acceptance threshold */
export const FALLBACK_CONFIDENCE = 0.5;

/** Confidence of the no-match default */
export const FALLBACK_MIN_CONFIDENCE = 0.2;

export const FALLBACK_DEFAULT_CATEGORY = IntentCategory.GENERAL_CHAT;

/**
 * 冻结关键词表，防止原地修改
 */
function freezeKeywordTable(table: KeywordTable): KeywordTable {
    const keywords: Partial<Record<IntentCategory, readonly string[]>> = {};
    for (const category of ALL_INTENT_CATEGORIES) {
        const phrases = table.keywords[category];
        if (phrases) {
            keywords[category] = Object.freeze([...phrases]);
        }
    }
    return Object.freeze({
        version: table.version,
        priority: Object.freeze([...table.priority]),
        keywords: Object.freeze(keywords),
    });
}

/**
 * 加载内置关键词表
 */
export function loadDefaultKeywordTable(): KeywordTable {
    const parsed = KeywordTableSchema.safeParse(defaultKeywords);
    if (!parsed.success) {
        throw new ConfigurationError(`Bundled keyword table is invalid: ${parsed.error.message}`, 'intent.keywordTable');
    }
    return freezeKeywordTable(parsed.data);
}

interface KeywordMatch {
    category: IntentCategory;
    keyword: string;
    position: number;
}

/**
 * 纯函数式分类器：无 I/O，相同输入总是得到相同结果
 *
 * 匹配规则：
 * - 关键词大小写不敏感，按子串匹配
 * - 多个类别命中时，关键词在文本中出现位置最早者胜出
 * - 位置相同时，按 priority 顺序靠前者胜出
 */
export class FallbackClassifier {
    private readonly table: KeywordTable;
    private readonly allowed: ReadonlySet<IntentCategory>;

    constructor(table: KeywordTable | undefined, categories: readonly IntentCategory[] = ALL_INTENT_CATEGORIES) {
        if (!table) {
            throw new ConfigurationError('Keyword table is required', 'intent.keywordTable');
        }
        if (!categories.includes(FALLBACK_DEFAULT_CATEGORY)) {
            throw new ConfigurationError(
                `Category set must contain ${FALLBACK_DEFAULT_CATEGORY}, the fallback default`,
                'intent.categories'
            );
        }
        for (const category of ALL_INTENT_CATEGORIES) {
            if (table.keywords[category] && !table.priority.includes(category)) {
                throw new ConfigurationError(
                    `Keyword table ${table.version} lists ${category} without a priority`,
                    'intent.keywordTable'
                );
            }
        }

        this.table = freezeKeywordTable(table);
        this.allowed = new Set(categories);
    }

    get version(): string {
        return this.table.version;
    }

    /**
     * 用新的关键词表快照创建分类器（原实例不变）
     */
    withTable(table: KeywordTable): FallbackClassifier {
        return new FallbackClassifier(table, [...this.allowed]);
    }

    classify(text: string): IntentResult {
        const match = this.findMatch(text.toLowerCase());

        if (!match) {
            return {
                category: FALLBACK_DEFAULT_CATEGORY,
                confidence: FALLBACK_MIN_CONFIDENCE,
                reasoning: `Fallback classification - no keyword matched, defaulting to ${FALLBACK_DEFAULT_CATEGORY}`,
                entities: {},
                followUpNeeded: false,
                contextDependent: false,
                suggestedActions: [],
                source: 'fallback',
                lowConfidence: false,
            };
        }

        return {
            category: match.category,
            confidence: FALLBACK_CONFIDENCE,
            reasoning: `Fallback classification based on keyword "${match.keyword}"`,
            entities: { matchedKeyword: match.keyword },
            followUpNeeded: false,
            contextDependent: false,
            suggestedActions: [],
            source: 'fallback',
            lowConfidence: false,
        };
    }

    private findMatch(lowered: string): KeywordMatch | null {
        let best: KeywordMatch | null = null;

        // priority 顺序遍历，位置相同时先到者保留
        for (const category of this.table.priority) {
            if (!this.allowed.has(category)) continue;

            for (const keyword of this.table.keywords[category] ?? []) {
                const position = lowered.indexOf(keyword.toLowerCase());
                if (position === -1) continue;

                if (!best || position < best.position) {
                    best = { category, keyword, position };
                }
            }
        }

        return best;
    }
}
