/**
 * 会话与对话轮次类型定义
 */

import { IntentCategory } from './index';

export type TurnRole = 'human' | 'assistant';

/**
 * 已提交的对话轮次（提交后不可变）
 */
export interface Turn {
    sessionId: string;
    sequence: number; // 会话内单调递增，从 1 开始，不复用
    role: TurnRole;
    content: string;
    intent: IntentCategory | null; // assistant 轮次为 null
    confidence: number | null;
    metadata: Record<string, unknown>;
    createdAt: number;
}

/**
 * 待写入的轮次，序号由存储分配
 */
export interface NewTurn {
    role: TurnRole;
    content: string;
    intent?: IntentCategory | null;
    confidence?: number | null;
    metadata?: Record<string, unknown>;
}

/**
 * 会话记录
 */
export interface SessionRecord {
    sessionId: string;
    createdAt: number;
    lastActivityAt: number;
    retentionLimit: number;
    turnCount: number;
    metadata: Record<string, unknown>;
}

export interface StoreSummary {
    totalSessions: number;
    totalTurns: number;
    humanTurns: number;
    assistantTurns: number;
    mostActiveSessionId: string | null;
    lastActivityAt: number | null;
}
