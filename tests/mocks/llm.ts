import { BaseLLM, LLMRequest, LLMResponse, LLMUsage } from '../../src/types';

type MockStep =
    | { kind: 'text'; text: string; model?: string; usage?: LLMUsage; delayMs?: number }
    | { kind: 'error'; error: Error }
    | { kind: 'hang' };

/**
 * 可编排的 LLM：按队列顺序返回脚本化结果，队列为空时返回默认文本
 */
export class MockLLM implements BaseLLM {
    public requests: LLMRequest[] = [];
    private steps: MockStep[] = [];
    private responses: Map<string, string> = new Map();
    private defaultResponse: string;

    constructor(defaultResponse: string = '') {
        this.defaultResponse = defaultResponse;
    }

    /**
     * 当请求内容包含 key 时返回 response（队列为空时生效）
     */
    setResponse(key: string, response: string): this {
        this.responses.set(key, response);
        return this;
    }

    setDefaultResponse(response: string): this {
        this.defaultResponse = response;
        return this;
    }

    respondWith(text: string, extra: { model?: string; usage?: LLMUsage; delayMs?: number } = {}): this {
        this.steps.push({ kind: 'text', text, ...extra });
        return this;
    }

    respondWithJSON(value: Record<string, unknown>, extra: { model?: string } = {}): this {
        return this.respondWith(JSON.stringify(value), extra);
    }

    failWith(error: Error): this {
        this.steps.push({ kind: 'error', error });
        return this;
    }

    /**
     * 永不返回，直到请求的 signal 被中止
     */
    hang(): this {
        this.steps.push({ kind: 'hang' });
        return this;
    }

    get callCount(): number {
        return this.requests.length;
    }

    async generate(request: LLMRequest): Promise<LLMResponse> {
        this.requests.push(request);
        const step = this.steps.shift();

        if (!step) {
            const prompt = [request.system, ...request.messages.map((m) => m.content)].join('\n');
            for (const [key, response] of this.responses.entries()) {
                if (prompt.includes(key)) {
                    return { text: response };
                }
            }
            return { text: this.defaultResponse };
        }

        switch (step.kind) {
            case 'error':
                throw step.error;
            case 'hang':
                return new Promise<LLMResponse>((_resolve, reject) => {
                    request.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
                });
            case 'text':
                if (step.delayMs) {
                    await new Promise((resolve) => setTimeout(resolve, step.delayMs));
                }
                return { text: step.text, model: step.model, usage: step.usage };
        }
    }
}

/**
 * 构造 oracle 分类输出
 */
export function intentJSON(
    category: string,
    confidence: number,
    extra: Record<string, unknown> = {}
): Record<string, unknown> {
    return { category, confidence, reasoning: `classified as ${category}`, entities: {}, ...extra };
}
