/**
 * Response Prompt 模板
 * @version 1.0.0
 */

import { ChatMessage, IntentCategory, IntentResult } from '../types';
import { Turn } from '../types/session';

export const RESPONSE_BASE_PROMPT = `You are a helpful AI assistant engaged in a natural conversation. You keep track of previous messages and give thoughtful, relevant responses.

CONVERSATION GUIDELINES:
- Be conversational and engaging
- Reference previous context when relevant
- Ask clarifying questions when needed
- Keep a friendly, professional tone
- Stay focused on the user's intent`;

const INTENT_GUIDANCE: Readonly<Record<IntentCategory, string>> = {
    [IntentCategory.GENERAL_CHAT]: 'Engage in natural conversation. Be friendly and show interest in what the user is sharing.',
    [IntentCategory.QUESTION_ANSWERING]: "Provide clear, accurate answers. If you're unsure, say so and suggest alternatives.",
    [IntentCategory.TASK_REQUEST]: 'Acknowledge the task request. Explain what you understand and discuss next steps.',
    [IntentCategory.INFORMATION_SEEKING]: 'Provide helpful information on the requested topic. Be thorough but concise.',
    [IntentCategory.CLARIFICATION]: 'Provide clear explanations and examples. Reference the conversation context appropriately.',
    [IntentCategory.GREETING]: 'Respond warmly to greetings. Set a positive tone for the conversation.',
    [IntentCategory.GOODBYE]: 'Acknowledge farewells appropriately. Offer to help again in the future.',
};

/**
 * 生成失败时使用的固定回复
 */
export const DEGRADED_RESPONSES: Readonly<Record<IntentCategory, string>> = Object.freeze({
    [IntentCategory.GENERAL_CHAT]: "I'd be happy to chat! Could you tell me more about what's on your mind?",
    [IntentCategory.QUESTION_ANSWERING]:
        "I'd like to help answer your question, but I'm having trouble processing it right now. Could you rephrase it?",
    [IntentCategory.TASK_REQUEST]:
        "I understand you're looking for assistance with a task. Let me know more details about what you need help with.",
    [IntentCategory.INFORMATION_SEEKING]:
        "I'd be glad to help you find information. What specific topic are you interested in?",
    [IntentCategory.CLARIFICATION]:
        'I want to make sure I give you a clear explanation. Could you help me understand what specifically needs clarification?',
    [IntentCategory.GREETING]: "Hello! It's great to meet you. How can I help you today?",
    [IntentCategory.GOODBYE]: 'Thank you for our conversation! Feel free to reach out anytime you need assistance.',
});

export function getDegradedResponse(category: IntentCategory): string {
    return DEGRADED_RESPONSES[category];
}

/**
 * 按意图构建生成系统提示词
 */
export function buildResponseSystemPrompt(intent: IntentResult): string {
    let notes = '';
    if (intent.contextDependent) {
        notes += '\n\nIMPORTANT: This message depends on previous conversation context. Review the conversation history carefully.';
    }
    if (intent.followUpNeeded) {
        notes += "\n\nNOTE: The user's intent may need clarification. Consider asking follow-up questions.";
    }

    return `${RESPONSE_BASE_PROMPT}

SPECIFIC GUIDANCE: ${INTENT_GUIDANCE[intent.category]}${notes}

INTENT DETECTED: ${intent.category} (confidence: ${intent.confidence.toFixed(2)})
REASONING: ${intent.reasoning}`;
}

/**
 * 历史轮次 + 当前输入 → 聊天消息
 */
export function buildResponseMessages(history: readonly Turn[], text: string): ChatMessage[] {
    const messages = history.map((turn): ChatMessage => ({
        role: turn.role === 'human' ? 'user' : 'assistant',
        content: turn.content,
    }));
    messages.push({ role: 'user', content: text });
    return messages;
}
