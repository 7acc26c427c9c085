import {
    CancelledError,
    ClassificationFailedError,
    ConfigurationError,
    IntentEngineError,
    OracleProtocolError,
    PartialCommitError,
    StorageError,
    ValidationError,
} from '../src/utils/errors';

describe('errors', () => {
    it('each error carries a stable code and status', () => {
        const cases: Array<[IntentEngineError, string, number]> = [
            [new ValidationError('bad input', 'text'), 'VALIDATION_ERROR', 400],
            [new ConfigurationError('bad config'), 'CONFIGURATION_ERROR', 400],
            [new StorageError('locked', 'append', true), 'STORAGE_ERROR', 500],
            [new OracleProtocolError('garbled'), 'ORACLE_PROTOCOL_ERROR', 502],
            [new CancelledError(), 'CANCELLED', 499],
        ];

        for (const [error, code, statusCode] of cases) {
            expect(error).toBeInstanceOf(IntentEngineError);
            expect(error.code).toBe(code);
            expect(error.statusCode).toBe(statusCode);
        }
    });

    it('toJSON exposes the details of each subclass', () => {
        expect(new StorageError('locked', 'append', true).toJSON()).toEqual({
            code: 'STORAGE_ERROR',
            message: 'locked',
            details: { operation: 'append', transient: true },
        });
        expect(new PartialCommitError('half written', 'session-1', 7, 'assistant').toJSON().details).toEqual({
            sessionId: 'session-1',
            sequence: 7,
            missing: 'assistant',
        });
        expect(new ClassificationFailedError('failed', 'raw text').toJSON().details).toEqual({ rawInput: 'raw text' });
        expect(new ValidationError('empty').toJSON().details).toEqual({});
    });

    it('uses the subclass name', () => {
        expect(new CancelledError().name).toBe('CancelledError');
        expect(new CancelledError().message).toBe('Operation cancelled');
    });

    it('truncates raw oracle responses in details', () => {
        const error = new OracleProtocolError('garbled', 'x'.repeat(600));
        expect(error.toJSON().details).toEqual({ rawResponse: 'x'.repeat(500) });
    });
});
