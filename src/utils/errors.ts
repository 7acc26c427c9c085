/**
 * Intent Engine Core - Error Types
 * Unified error handling for the intent engine
 */

export class IntentEngineError extends Error {
    public readonly code: string;
    public readonly statusCode: number;

    constructor(message: string, code: string, statusCode: number = 500) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.statusCode = statusCode;

        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    /**
     * Stable, serializable view for result objects and logs
     */
    toJSON(): { code: string; message: string; details: Record<string, unknown> } {
        return { code: this.code, message: this.message, details: this.details() };
    }

    protected details(): Record<string, unknown> {
        return {};
    }
}

export class ValidationError extends IntentEngineError {
    constructor(message: string, public field?: string) {
        super(message, 'VALIDATION_ERROR', 400);
    }

    protected details(): Record<string, unknown> {
        return this.field ? { field: this.field } : {};
    }
}

export class StorageError extends IntentEngineError {
    constructor(
        message: string,
        public operation?: string,
        public transient: boolean = false,
        public cause?: unknown
    ) {
        super(message, 'STORAGE_ERROR', 500);
    }

    protected details(): Record<string, unknown> {
        return { operation: this.operation, transient: this.transient };
    }
}

export class ConfigurationError extends IntentEngineError {
    constructor(message: string, public field?: string) {
        super(message, 'CONFIGURATION_ERROR', 400);
    }

    protected details(): Record<string, unknown> {
        return this.field ? { field: this.field } : {};
    }
}

/**
 * 传输层失败（超时、连接失败、非 2xx）。分类器与编排器内部恢复，不向调用方传播
 */
export class OracleUnavailableError extends IntentEngineError {
    constructor(message: string, public timeoutMs?: number) {
        super(message, 'ORACLE_UNAVAILABLE', 503);
    }

    protected details(): Record<string, unknown> {
        return this.timeoutMs !== undefined ? { timeoutMs: this.timeoutMs } : {};
    }
}

/**
 * 响应格式错误或类别不在允许集合内
 */
export class OracleProtocolError extends IntentEngineError {
    constructor(message: string, public rawResponse?: string) {
        super(message, 'ORACLE_PROTOCOL_ERROR', 502);
    }

    protected details(): Record<string, unknown> {
        return this.rawResponse !== undefined ? { rawResponse: this.rawResponse.slice(0, 500) } : {};
    }
}

export class ClassificationFailedError extends IntentEngineError {
    constructor(message: string, public rawInput: string, public cause?: unknown) {
        super(message, 'CLASSIFICATION_FAILED', 500);
    }

    protected details(): Record<string, unknown> {
        return { rawInput: this.rawInput };
    }
}

export class PartialCommitError extends IntentEngineError {
    constructor(
        message: string,
        public sessionId: string,
        public sequence: number,
        public missing: 'human' | 'assistant',
        public cause?: unknown
    ) {
        super(message, 'PARTIAL_COMMIT', 500);
    }

    protected details(): Record<string, unknown> {
        return { sessionId: this.sessionId, sequence: this.sequence, missing: this.missing };
    }
}

export class CancelledError extends IntentEngineError {
    constructor(message: string = 'Operation cancelled') {
        super(message, 'CANCELLED', 499);
    }
}
