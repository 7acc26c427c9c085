/**
 * Intent Engine Core - 存储接口定义
 * @version 1.0.0
 */

import { NewTurn, SessionRecord, StoreSummary, Turn } from '../types/session';

/**
 * 会话存储接口 (对应 SQLite)
 */
export interface ISessionStore {
    /**
     * 追加一个轮次
     * 同一会话的写入串行执行；不同会话互不等待
     * @param sessionMetadata 仅在本次写入创建会话时保存
     * @returns 分配的序号
     */
    append(sessionId: string, turn: NewTurn, sessionMetadata?: Record<string, unknown>): Promise<number>;

    /**
     * 读取最近的轮次（按序号升序）
     * 未知会话返回空数组
     */
    readRecent(sessionId: string, limit: number): Promise<Turn[]>;

    /**
     * 读取保留的全部轮次（按序号升序）
     */
    readAll(sessionId: string): Promise<Turn[]>;

    getSession(sessionId: string): Promise<SessionRecord | null>;

    /**
     * 列出全部会话，最近活动优先
     */
    listSessions(): Promise<SessionRecord[]>;

    /**
     * 删除会话及其全部轮次（幂等）
     * @returns 会话是否存在
     */
    deleteSession(sessionId: string): Promise<boolean>;

    /**
     * 清空轮次，保留会话记录
     * @returns 删除的轮次数量
     */
    clearSession(sessionId: string): Promise<number>;

    countTurns(sessionId: string): Promise<number>;

    getSummary(): Promise<StoreSummary>;

    close(): void;
}
