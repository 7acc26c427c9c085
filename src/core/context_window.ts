/**
 * ContextWindowBuilder - 为分类和生成选取近期对话轮次
 */

import { ISessionStore } from '../interfaces/store';
import { Turn } from '../types/session';

export class ContextWindowBuilder {
    constructor(private store: ISessionStore) {}

    /**
     * 读取最近 maxTurns 个轮次，再从最旧一端丢弃，直到总字符数不超过 maxChars
     * @returns 按序号升序的轮次
     */
    async build(sessionId: string, maxTurns: number, maxChars: number): Promise<Turn[]> {
        if (maxTurns <= 0 || maxChars <= 0) {
            return [];
        }

        const recent = await this.store.readRecent(sessionId, maxTurns);

        let total = recent.reduce((sum, turn) => sum + turn.content.length, 0);
        let start = 0;
        while (start < recent.length && total > maxChars) {
            total -= recent[start].content.length;
            start++;
        }

        return recent.slice(start);
    }
}
