import { ISessionStore } from '../../src/interfaces/store';
import { NewTurn, SessionRecord, StoreSummary, Turn, TurnRole } from '../../src/types/session';

interface ScheduledFailure {
    role?: TurnRole;
    error: () => Error;
}

/**
 * 包装真实存储，按计划让 append 失败
 */
export class FlakySessionStore implements ISessionStore {
    public appendAttempts: NewTurn[] = [];
    private failures: ScheduledFailure[] = [];
    private listeners: Array<(turn: NewTurn) => void> = [];

    constructor(private inner: ISessionStore) {}

    failAppend(error: () => Error, options: { role?: TurnRole; times?: number } = {}): this {
        const times = options.times ?? 1;
        for (let i = 0; i < times; i++) {
            this.failures.push({ role: options.role, error });
        }
        return this;
    }

    /**
     * 每次 append 开始时同步调用
     */
    onAppend(listener: (turn: NewTurn) => void): this {
        this.listeners.push(listener);
        return this;
    }

    async append(sessionId: string, turn: NewTurn, sessionMetadata?: Record<string, unknown>): Promise<number> {
        this.appendAttempts.push(turn);
        this.listeners.forEach((listener) => listener(turn));
        const index = this.failures.findIndex((failure) => !failure.role || failure.role === turn.role);
        if (index !== -1) {
            const [failure] = this.failures.splice(index, 1);
            throw failure.error();
        }
        return this.inner.append(sessionId, turn, sessionMetadata);
    }

    readRecent(sessionId: string, limit: number): Promise<Turn[]> {
        return this.inner.readRecent(sessionId, limit);
    }

    readAll(sessionId: string): Promise<Turn[]> {
        return this.inner.readAll(sessionId);
    }

    getSession(sessionId: string): Promise<SessionRecord | null> {
        return this.inner.getSession(sessionId);
    }

    listSessions(): Promise<SessionRecord[]> {
        return this.inner.listSessions();
    }

    deleteSession(sessionId: string): Promise<boolean> {
        return this.inner.deleteSession(sessionId);
    }

    clearSession(sessionId: string): Promise<number> {
        return this.inner.clearSession(sessionId);
    }

    countTurns(sessionId: string): Promise<number> {
        return this.inner.countTurns(sessionId);
    }

    getSummary(): Promise<StoreSummary> {
        return this.inner.getSummary();
    }

    close(): void {
        this.inner.close();
    }
}
