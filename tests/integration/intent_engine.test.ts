import { IntentEngine } from '../../src/intent_engine';
import { SQLiteSessionStore } from '../../src/storage/sqlite';
import { IntentCategory, IntentEngineConfig } from '../../src/types';
import { ConfigurationError, StorageError, ValidationError } from '../../src/utils/errors';
import { intentJSON, MockLLM } from '../mocks/llm';
import { FlakySessionStore } from '../mocks/store';

describe('IntentEngine Integration', () => {
    let classifierLLM: MockLLM;
    let generatorLLM: MockLLM;
    let engine: IntentEngine;

    const configFor = (overrides: Partial<IntentEngineConfig> = {}): IntentEngineConfig => ({
        storage: { sqlitePath: ':memory:' },
        llm: { classifier: classifierLLM, generator: generatorLLM },
        oracle: { timeoutMs: 50 },
        commit: { retryDelayMs: 1 },
        ...overrides,
    });

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);

        classifierLLM = new MockLLM();
        generatorLLM = new MockLLM('Sure thing.');
        engine = new IntentEngine(configFor());
    });

    afterEach(async () => {
        await engine.close();
        jest.restoreAllMocks();
    });

    it('should classify a greeting through the oracle and record the exchange', async () => {
        classifierLLM.respondWithJSON(intentJSON('greeting', 0.95));
        generatorLLM.respondWith('Hello! What can I do for you?');

        const result = await engine.process('Hello there!', 'session-1');

        expect(result.success).toBe(true);
        expect(result.intent).toBe(IntentCategory.GREETING);
        expect(result.confidence).toBeGreaterThanOrEqual(0.7);

        const history = await engine.history('session-1');
        expect(history.map((t) => [t.sequence, t.role, t.content])).toEqual([
            [1, 'human', 'Hello there!'],
            [2, 'assistant', 'Hello! What can I do for you?'],
        ]);
    });

    it('should fall back to keywords when the oracle is down', async () => {
        classifierLLM.failWith(new Error('connection refused'));

        const result = await engine.process('Hello there!', 'session-1');

        expect(result).toMatchObject({
            success: true,
            intent: IntentCategory.GREETING,
            confidence: 0.5,
            source: 'fallback',
            lowConfidence: false,
        });
    });

    it('should commit a degraded response when generation times out', async () => {
        classifierLLM.respondWithJSON(intentJSON('question_answering', 0.9));
        generatorLLM.hang();

        const result = await engine.process('What is the tallest mountain?', 'session-1');

        expect(result.success).toBe(true);
        expect(result.degraded).toBe(true);
        expect(result.intent).toBe(IntentCategory.QUESTION_ANSWERING);
        expect(result.response).toBe(
            "I'd like to help answer your question, but I'm having trouble processing it right now. Could you rephrase it?"
        );
        expect(await engine.history('session-1')).toHaveLength(2);
    });

    it('should analyze a follow-up with conversation context without writing', async () => {
        classifierLLM.respondWithJSON(intentJSON('question_answering', 0.92));
        generatorLLM.respondWith('Machine learning lets computers learn patterns from data.');
        await engine.process('What is machine learning?', 'ml-chat');

        classifierLLM.respondWithJSON(intentJSON('clarification', 0.85, { context_dependent: true }));
        const analysis = await engine.analyze('Can you give me a simple example?', 'ml-chat');

        expect(analysis.category).toBe(IntentCategory.CLARIFICATION);
        expect(analysis.contextDependent).toBe(true);
        expect(classifierLLM.requests[1].messages[0].content).toBe(
            'CONVERSATION CONTEXT: User: What is machine learning? | ' +
                'Assistant: Machine learning lets computers learn patterns from data.\n\n' +
                'ANALYZE THIS INPUT: Can you give me a simple example?'
        );
        expect(await engine.history('ml-chat')).toHaveLength(2);
        expect(generatorLLM.callCount).toBe(1);
    });

    it('should analyze without a session', async () => {
        const analysis = await engine.analyze('Goodbye!');

        expect(analysis.category).toBe(IntentCategory.GOODBYE);
        expect(analysis.source).toBe('fallback');
        await expect(engine.analyze('')).rejects.toBeInstanceOf(ValidationError);
    });

    it('should apply the configured retention policy', async () => {
        await engine.close();
        engine = new IntentEngine(configFor({ retention: { maxTurnsPerSession: 4 } }));

        for (const text of ['one', 'two', 'three']) {
            await engine.process(text, 'short');
        }

        const history = await engine.history('short');
        expect(history.map((t) => t.sequence)).toEqual([3, 4, 5, 6]);
        expect(history[0].content).toBe('two');
    });

    it('should list, clear and delete sessions', async () => {
        await engine.process('xyz', 'alpha');
        await engine.process('xyz', 'beta');

        expect((await engine.sessions()).map((s) => s.sessionId).sort()).toEqual(['alpha', 'beta']);
        expect(await engine.clearSession('alpha')).toBe(2);
        expect(await engine.history('alpha')).toEqual([]);
        expect((await engine.getSession('alpha'))?.turnCount).toBe(0);

        expect(await engine.deleteSession('beta')).toBe(true);
        expect(await engine.deleteSession('beta')).toBe(false);
        expect(await engine.deleteSession('never-existed')).toBe(false);
        expect((await engine.sessions()).map((s) => s.sessionId)).toEqual(['alpha']);
    });

    it('should reject malformed session ids', async () => {
        await expect(engine.history('no spaces allowed')).rejects.toBeInstanceOf(ValidationError);
        await expect(engine.deleteSession('')).rejects.toBeInstanceOf(ValidationError);
    });

    it('should report status', async () => {
        await engine.process('xyz', 'alpha');

        const status = await engine.getStatus();

        expect(status.version).toBe('1.0.0');
        expect(status.supportedIntents).toHaveLength(7);
        expect(status.keywordTableVersion).toBe('2024.1');
        expect(status.config).toEqual({
            sqlitePath: ':memory:',
            confidenceThreshold: 0.7,
            retention: { maxTurnsPerSession: 100 },
            contextWindow: { maxTurns: 20, maxChars: 4000 },
            oracleTimeoutMs: 50,
            commit: { maxRetries: 3, retryDelayMs: 1 },
        });
        expect(status.summary).toMatchObject({
            totalSessions: 1,
            totalTurns: 2,
            humanTurns: 1,
            assistantTurns: 1,
            mostActiveSessionId: 'alpha',
        });
    });

    it('should use the classifier driver for generation when no generator is given', async () => {
        await engine.close();
        const shared = new MockLLM();
        shared.respondWithJSON(intentJSON('greeting', 0.9)).respondWith('Hey, nice to see you.');
        engine = new IntentEngine({ storage: { sqlitePath: ':memory:' }, llm: { classifier: shared } });

        const result = await engine.process('Hello there!', 'shared');

        expect(result.response).toBe('Hey, nice to see you.');
        expect(shared.callCount).toBe(2);
    });

    it('should report partial commits through the result object', async () => {
        await engine.close();
        const store = new FlakySessionStore(new SQLiteSessionStore(':memory:', { retention: { maxTurnsPerSession: 100 } }));
        store.failAppend(() => new StorageError('database is locked', 'append', true), { role: 'assistant', times: 4 });
        engine = new IntentEngine(configFor(), { store });

        const result = await engine.process('xyz', 'partial');

        expect(result.success).toBe(false);
        expect(result.error).toEqual({
            code: 'PARTIAL_COMMIT',
            message: expect.stringContaining('partial#1'),
            details: { sessionId: 'partial', sequence: 1, missing: 'assistant' },
        });
        expect((await engine.history('partial')).map((t) => t.role)).toEqual(['human']);
    });

    it('should reject invalid configuration', () => {
        expect(() => new IntentEngine(configFor({ storage: { sqlitePath: '' } }))).toThrow(ConfigurationError);
        expect(() => new IntentEngine(configFor({ intent: { confidenceThreshold: 0.4 } }))).toThrow(ConfigurationError);
    });

    it('should remove listeners on close', async () => {
        engine.orchestrator.on('transition', () => undefined);
        await engine.close();

        expect(engine.orchestrator.listenerCount('transition')).toBe(0);
    });
});
