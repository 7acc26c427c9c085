/**
 * SQLite 会话存储
 * @version 1.0.0
 */

import Database from 'better-sqlite3';
import path from 'path';
import { ISessionStore } from '../interfaces/store';
import { ALL_INTENT_CATEGORIES, IntentCategory, parseIntentCategory, RetentionPolicy } from '../types';
import { NewTurn, SessionRecord, StoreSummary, Turn, TurnRole } from '../types/session';
import { KeyedWriteQueue } from '../core/write_queue';
import { ConfigurationError, StorageError } from '../utils/errors';
import { MetadataSchema } from '../utils/schemas';

export interface SQLiteSessionStoreOptions {
    retention: RetentionPolicy;
    busyTimeoutMs?: number;
}

interface SessionRow {
    session_id: string;
    created_at: number;
    last_activity_at: number;
    retention_limit: number;
    next_sequence: number;
    metadata: string;
    turn_count: number;
}

interface TurnRow {
    session_id: string;
    sequence: number;
    role: string;
    content: string;
    intent: string | null;
    confidence: number | null;
    metadata: string;
    created_at: number;
}

const TURN_COLUMNS = 'session_id, sequence, role, content, intent, confidence, metadata, created_at';

/**
 * SQLITE_BUSY / SQLITE_LOCKED 及其扩展码视为可重试
 */
function isTransientCode(code: string): boolean {
    return code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED');
}

function toStorageError(operation: string, error: unknown): StorageError {
    if (error instanceof StorageError) {
        return error;
    }
    if (error instanceof Database.SqliteError) {
        return new StorageError(`${operation} failed: ${error.message}`, operation, isTransientCode(error.code), error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new StorageError(`${operation} failed: ${message}`, operation, false, error);
}

/**
 * 会话存储实现
 * - 每次 append 是一个 SQLite 事务：分配序号、写入轮次、更新会话、按保留策略淘汰
 * - 同一会话的写入经由 KeyedWriteQueue 串行
 * - WAL 模式，读操作不会看到未提交的轮次
 */
export class SQLiteSessionStore implements ISessionStore {
    private db: Database.Database;
    private dbPath: string;
    private retention: RetentionPolicy;
    private writes: KeyedWriteQueue = new KeyedWriteQueue();

    constructor(dbPath: string, options: SQLiteSessionStoreOptions) {
        if (!Number.isInteger(options.retention.maxTurnsPerSession) || options.retention.maxTurnsPerSession < 1) {
            throw new ConfigurationError('retention.maxTurnsPerSession must be an integer >= 1', 'retention.maxTurnsPerSession');
        }
        this.retention = Object.freeze({ ...options.retention });
        this.dbPath = dbPath === ':memory:' ? dbPath : path.resolve(dbPath);

        try {
            this.db = new Database(this.dbPath);

            // 开启 WAL 模式 - 允许并发读写
            this.db.pragma('journal_mode = WAL');
            this.db.pragma('synchronous = NORMAL');
            this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
        } catch (error) {
            throw toStorageError('open', error);
        }

        this.init();
    }

    /**
     * 初始化数据库表结构
     */
    private init(): void {
        this.guard('init', () => {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS sessions (
                    session_id TEXT PRIMARY KEY,
                    created_at INTEGER NOT NULL,
                    last_activity_at INTEGER NOT NULL,
                    retention_limit INTEGER NOT NULL,
                    next_sequence INTEGER NOT NULL DEFAULT 1,
                    metadata TEXT NOT NULL DEFAULT '{}'
                );
            `);
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS turns (
                    session_id TEXT NOT NULL,
                    sequence INTEGER NOT NULL,
                    role TEXT NOT NULL CHECK(role IN ('human', 'assistant')),
                    content TEXT NOT NULL,
                    intent TEXT,
                    confidence REAL CHECK(confidence IS NULL OR (confidence >= 0 AND confidence <= 1)),
                    metadata TEXT NOT NULL DEFAULT '{}',
                    created_at INTEGER NOT NULL,
                    PRIMARY KEY (session_id, sequence)
                );
            `);
            this.db.exec(`
                CREATE INDEX IF NOT EXISTS idx_turns_session_sequence ON turns(session_id, sequence);
                CREATE INDEX IF NOT EXISTS idx_sessions_activity ON sessions(last_activity_at);
            `);
        });
    }

    getDbPath(): string {
        return this.dbPath;
    }

    // ---------- Writes (serialized per session) ----------

    append(sessionId: string, turn: NewTurn, sessionMetadata?: Record<string, unknown>): Promise<number> {
        return this.writes.run(sessionId, () =>
            this.guard('append', () => this.appendTransaction(sessionId, turn, sessionMetadata))
        );
    }

    private appendTransaction(sessionId: string, turn: NewTurn, sessionMetadata?: Record<string, unknown>): number {
        const now = Date.now();
        const limit = this.retention.maxTurnsPerSession;

        const tx = this.db.transaction((): number => {
            this.db.prepare(`
                INSERT INTO sessions (session_id, created_at, last_activity_at, retention_limit, next_sequence, metadata)
                VALUES (?, ?, ?, ?, 1, ?)
                ON CONFLICT(session_id) DO NOTHING
            `).run(sessionId, now, now, limit, JSON.stringify(sessionMetadata ?? {}));

            const session = this.db
                .prepare<[string], { next_sequence: number }>('SELECT next_sequence FROM sessions WHERE session_id = ?')
                .get(sessionId);
            if (!session) {
                throw new StorageError(`Session ${sessionId} vanished during append`, 'append');
            }
            const sequence = session.next_sequence;

            this.db.prepare(`
                INSERT INTO turns (${TURN_COLUMNS})
                VALUES (?, ?, ?, ?, ?, ?, ?, ?)
            `).run(
                sessionId,
                sequence,
                turn.role,
                turn.content,
                turn.intent ?? null,
                turn.confidence ?? null,
                JSON.stringify(turn.metadata ?? {}),
                now
            );

            this.db.prepare(`
                UPDATE sessions
                SET next_sequence = ?, last_activity_at = ?, retention_limit = ?
                WHERE session_id = ?
            `).run(sequence + 1, now, limit, sessionId);

            // 保留最近 limit 条，按序号淘汰最旧的
            this.db.prepare(`
                DELETE FROM turns
                WHERE session_id = ?
                AND sequence <= (
                    SELECT sequence FROM turns
                    WHERE session_id = ?
                    ORDER BY sequence DESC
                    LIMIT 1 OFFSET ?
                )
            `).run(sessionId, sessionId, limit);

            return sequence;
        });

        return tx();
    }

    deleteSession(sessionId: string): Promise<boolean> {
        return this.writes.run(sessionId, () =>
            this.guard('deleteSession', () => {
                const tx = this.db.transaction((): boolean => {
                    this.db.prepare('DELETE FROM turns WHERE session_id = ?').run(sessionId);
                    const result = this.db.prepare('DELETE FROM sessions WHERE session_id = ?').run(sessionId);
                    return result.changes > 0;
                });
                return tx();
            })
        );
    }

    clearSession(sessionId: string): Promise<number> {
        return this.writes.run(sessionId, () =>
            this.guard('clearSession', () => {
                const tx = this.db.transaction((): number => {
                    const result = this.db.prepare('DELETE FROM turns WHERE session_id = ?').run(sessionId);
                    this.db
                        .prepare('UPDATE sessions SET last_activity_at = ? WHERE session_id = ?')
                        .run(Date.now(), sessionId);
                    return result.changes;
                });
                return tx();
            })
        );
    }

    // ---------- Reads ----------

    async readRecent(sessionId: string, limit: number): Promise<Turn[]> {
        if (limit <= 0) {
            return [];
        }
        return this.guard('readRecent', () => {
            const rows = this.db
                .prepare<[string, number], TurnRow>(`
                    SELECT ${TURN_COLUMNS} FROM turns
                    WHERE session_id = ?
                    ORDER BY sequence DESC
                    LIMIT ?
                `)
                .all(sessionId, limit);
            return rows.reverse().map((row) => this.toTurn(row));
        });
    }

    async readAll(sessionId: string): Promise<Turn[]> {
        return this.guard('readAll', () => {
            const rows = this.db
                .prepare<[string], TurnRow>(`SELECT ${TURN_COLUMNS} FROM turns WHERE session_id = ? ORDER BY sequence ASC`)
                .all(sessionId);
            return rows.map((row) => this.toTurn(row));
        });
    }

    async getSession(sessionId: string): Promise<SessionRecord | null> {
        return this.guard('getSession', () => {
            const row = this.db
                .prepare<[string], SessionRow>(`
                    SELECT s.*, (SELECT COUNT(*) FROM turns t WHERE t.session_id = s.session_id) AS turn_count
                    FROM sessions s
                    WHERE s.session_id = ?
                `)
                .get(sessionId);
            return row ? this.toSession(row) : null;
        });
    }

    async listSessions(): Promise<SessionRecord[]> {
        return this.guard('listSessions', () => {
            const rows = this.db
                .prepare<[], SessionRow>(`
                    SELECT s.*, (SELECT COUNT(*) FROM turns t WHERE t.session_id = s.session_id) AS turn_count
                    FROM sessions s
                    ORDER BY s.last_activity_at DESC, s.session_id ASC
                `)
                .all();
            return rows.map((row) => this.toSession(row));
        });
    }

    async countTurns(sessionId: string): Promise<number> {
        return this.guard('countTurns', () => {
            const row = this.db
                .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM turns WHERE session_id = ?')
                .get(sessionId);
            return row?.count ?? 0;
        });
    }

    async getSummary(): Promise<StoreSummary> {
        return this.guard('getSummary', () => {
            const sessions = this.db
                .prepare<[], { total: number; last_activity_at: number | null }>(
                    'SELECT COUNT(*) AS total, MAX(last_activity_at) AS last_activity_at FROM sessions'
                )
                .get();
            const turns = this.db
                .prepare<[], { total: number; human: number; assistant: number }>(`
                    SELECT
                        COUNT(*) AS total,
                        COALESCE(SUM(CASE WHEN role = 'human' THEN 1 ELSE 0 END), 0) AS human,
                        COALESCE(SUM(CASE WHEN role = 'assistant' THEN 1 ELSE 0 END), 0) AS assistant
                    FROM turns
                `)
                .get();
            const mostActive = this.db
                .prepare<[], { session_id: string }>(`
                    SELECT session_id FROM turns
                    GROUP BY session_id
                    ORDER BY COUNT(*) DESC, session_id ASC
                    LIMIT 1
                `)
                .get();

            return {
                totalSessions: sessions?.total ?? 0,
                totalTurns: turns?.total ?? 0,
                humanTurns: turns?.human ?? 0,
                assistantTurns: turns?.assistant ?? 0,
                mostActiveSessionId: mostActive?.session_id ?? null,
                lastActivityAt: sessions?.last_activity_at ?? null,
            };
        });
    }

    /**
     * 等待排队中的写入完成后关闭
     */
    async closeAfterPendingWrites(): Promise<void> {
        await this.writes.drain();
        this.close();
    }

    close(): void {
        if (this.db.open) {
            this.db.close();
        }
    }

    // ---------- Helpers ----------

    private guard<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            const storageError = toStorageError(operation, error);
            console.error(`[SQLiteSessionStore] ${storageError.message}`);
            throw storageError;
        }
    }

    private toTurn(row: TurnRow): Turn {
        return {
            sessionId: row.session_id,
            sequence: row.sequence,
            role: this.toRole(row.role),
            content: row.content,
            intent: this.toIntent(row.intent),
            confidence: row.confidence,
            metadata: this.parseMetadata(row.metadata),
            createdAt: row.created_at,
        };
    }

    private toSession(row: SessionRow): SessionRecord {
        return {
            sessionId: row.session_id,
            createdAt: row.created_at,
            lastActivityAt: row.last_activity_at,
            retentionLimit: row.retention_limit,
            turnCount: row.turn_count,
            metadata: this.parseMetadata(row.metadata),
        };
    }

    private toRole(value: string): TurnRole {
        if (value === 'human' || value === 'assistant') {
            return value;
        }
        throw new StorageError(`Corrupt turn role: ${value}`, 'read');
    }

    private toIntent(value: string | null): IntentCategory | null {
        if (value === null) {
            return null;
        }
        const category = parseIntentCategory(value, ALL_INTENT_CATEGORIES);
        if (category === 'unknown') {
            throw new StorageError(`Corrupt intent category: ${value}`, 'read');
        }
        return category;
    }

    private parseMetadata(raw: string): Record<string, unknown> {
        const parsed = MetadataSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
            throw new StorageError('Corrupt metadata: expected a JSON object', 'read');
        }
        return parsed.data;
    }
}
