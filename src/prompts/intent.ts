/**
 * Intent Classification Prompt 模板
 * @version 1.0.0
 */

import { IntentCategory, INTENT_DESCRIPTIONS } from '../types';
import { Turn } from '../types/session';

/** 上下文摘要中每条内容的最大长度 */
export const CONTEXT_CONTENT_LIMIT = 100;

/**
 * 构建分类系统提示词（仅列出允许的类别）
 */
export function buildIntentSystemPrompt(categories: readonly IntentCategory[]): string {
    const categoryLines = categories.map((category) => `- ${category}: ${INTENT_DESCRIPTIONS[category]}`).join('\n');

    return `You are an expert intent analysis system. Analyze the user input and determine the primary intent.

INTENT CATEGORIES:
${categoryLines}

ANALYSIS REQUIREMENTS:
1. Classify the primary intent into exactly one of the categories above
2. Give a confidence score (0.0 to 1.0) based on how clear the intent is
3. Extract relevant entities (names, dates, topics, etc.)
4. Decide whether follow-up questions are needed
5. Decide whether the input depends on the conversation context

RESPONSE FORMAT:
Respond with ONLY a valid JSON object in this exact format:
{
    "category": "intent_category",
    "confidence": 0.85,
    "reasoning": "Short explanation of why this intent was chosen",
    "entities": {"key": "value"},
    "follow_up_needed": false,
    "context_dependent": false,
    "suggested_actions": []
}
`;
}

function truncate(content: string, limit: number): string {
    return content.length > limit ? `${content.slice(0, limit)}...` : content;
}

/**
 * 序列化上下文窗口："User: ... | Assistant: ..."
 */
export function serializeContext(turns: readonly Turn[]): string {
    return turns
        .map((turn) => {
            const role = turn.role === 'human' ? 'User' : 'Assistant';
            return `${role}: ${truncate(turn.content, CONTEXT_CONTENT_LIMIT)}`;
        })
        .join(' | ');
}

/**
 * 构建分类请求的用户消息
 */
export function buildIntentUserMessage(text: string, context: readonly Turn[]): string {
    const summary = serializeContext(context);
    if (!summary) {
        return `ANALYZE THIS INPUT: ${text}`;
    }
    return `CONVERSATION CONTEXT: ${summary}\n\nANALYZE THIS INPUT: ${text}`;
}
