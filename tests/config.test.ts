import { resolveConfig } from '../src/utils/config';
import { IntentCategory, IntentEngineConfig } from '../src/types';
import { ConfigurationError } from '../src/utils/errors';
import { MockLLM } from './mocks/llm';

describe('resolveConfig', () => {
    const llm = new MockLLM();
    const base: IntentEngineConfig = {
        storage: { sqlitePath: ':memory:' },
        llm: { classifier: llm },
    };

    function expectConfigError(config: IntentEngineConfig, field: string): void {
        try {
            resolveConfig(config);
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigurationError);
            expect(error).toMatchObject({ field });
            return;
        }
        throw new Error(`expected a ConfigurationError on ${field}`);
    }

    it('应该填充默认值', () => {
        const resolved = resolveConfig(base);

        expect(resolved.storage).toEqual({ sqlitePath: ':memory:', busyTimeoutMs: 5000 });
        expect(resolved.llm.generator).toBe(llm);
        expect(resolved.intent.categories).toHaveLength(7);
        expect(resolved.intent.confidenceThreshold).toBe(0.7);
        expect(resolved.intent.keywordTable.version).toBe('2024.1');
        expect(resolved.retention).toEqual({ maxTurnsPerSession: 100 });
        expect(resolved.contextWindow).toEqual({ maxTurns: 20, maxChars: 4000 });
        expect(resolved.oracle).toEqual({ timeoutMs: 30000 });
        expect(resolved.commit).toEqual({ maxRetries: 3, retryDelayMs: 50 });
    });

    it('结果应该被冻结', () => {
        const resolved = resolveConfig(base);

        expect(Object.isFrozen(resolved)).toBe(true);
        expect(Object.isFrozen(resolved.intent.categories)).toBe(true);
    });

    it('应该去重类别', () => {
        const resolved = resolveConfig({
            ...base,
            intent: { categories: [IntentCategory.GENERAL_CHAT, IntentCategory.GREETING, IntentCategory.GREETING] },
        });

        expect(resolved.intent.categories).toEqual([IntentCategory.GENERAL_CHAT, IntentCategory.GREETING]);
    });

    it('应该保留独立的 generator', () => {
        const generator = new MockLLM();
        expect(resolveConfig({ ...base, llm: { classifier: llm, generator } }).llm.generator).toBe(generator);
    });

    it('应该报告非法字段', () => {
        expectConfigError({ ...base, storage: { sqlitePath: '  ' } }, 'storage.sqlitePath');
        expectConfigError({ ...base, intent: { confidenceThreshold: 1.5 } }, 'intent.confidenceThreshold');
        expectConfigError({ ...base, intent: { confidenceThreshold: 0.5 } }, 'intent.confidenceThreshold');
        expectConfigError({ ...base, retention: { maxTurnsPerSession: 0 } }, 'retention.maxTurnsPerSession');
        expectConfigError({ ...base, contextWindow: { maxChars: -1 } }, 'contextWindow.maxChars');
        expectConfigError({ ...base, intent: { categories: [] } }, 'intent.categories');
        expectConfigError({ ...base, oracle: { timeoutMs: 2_147_483_648 } }, 'oracle.timeoutMs');
    });

    it('应该接受 setTimeout 允许的最大超时', () => {
        expect(resolveConfig({ ...base, oracle: { timeoutMs: 2_147_483_647 } }).oracle.timeoutMs).toBe(2_147_483_647);
    });

    it('缺少 generate 方法的 LLM 应该被拒绝', () => {
        const raw = '{"storage": {"sqlitePath": ":memory:"}, "llm": {"classifier": {"name": "stub"}}}';
        expectConfigError(JSON.parse(raw), 'llm.classifier');
    });
});
