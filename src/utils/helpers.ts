/**
 * 工具函数
 * @version 1.0.0
 */

import { v4 as uuidv4 } from 'uuid';
import { CancelledError } from './errors';

/**
 * 生成 UUID
 */
export function generateId(): string {
    return uuidv4();
}

/**
 * 从文本中提取 JSON
 * 支持提取被代码块包裹的 JSON
 */
export function extractJSON(text: string): string {
    // 尝试提取代码块中的内容
    const codeBlockMatch = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
    if (codeBlockMatch) {
        return codeBlockMatch[1].trim();
    }

    // 尝试直接返回 JSON 片段
    const jsonMatch = text.match(/\{[\s\S]*\}/);
    if (jsonMatch) {
        return jsonMatch[0];
    }

    return text.trim();
}

/**
 * 安全解析 JSON
 */
export function safeParseJSON(text: string): unknown {
    try {
        return JSON.parse(extractJSON(text));
    } catch (error) {
        throw new Error(
            `Failed to parse JSON: ${error instanceof Error ? error.message : 'Unknown error'}\n\nOriginal text:\n${text}`
        );
    }
}

/**
 * 延迟函数
 */
export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 重试函数
 * shouldRetry 返回 false 时立即抛出，不再重试
 */
export async function retry<T>(
    fn: () => Promise<T>,
    options: {
        maxAttempts?: number;
        delayMs?: number;
        shouldRetry?: (error: Error) => boolean;
        onRetry?: (error: Error, attempt: number) => void;
    } = {}
): Promise<T> {
    const { maxAttempts = 3, delayMs = 1000, shouldRetry, onRetry } = options;

    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            if (shouldRetry && !shouldRetry(lastError)) {
                throw lastError;
            }

            if (attempt < maxAttempts) {
                if (onRetry) {
                    onRetry(lastError, attempt);
                }
                await delay(delayMs);
            }
        }
    }

    throw lastError;
}

/**
 * 带超时执行异步任务
 * 超时或外部取消时会中止传入任务的 signal；外部取消抛出 CancelledError
 */
export function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    options: {
        signal?: AbortSignal;
        onTimeout?: () => Error;
    } = {}
): Promise<T> {
    const { signal, onTimeout = () => new Error(`Timed out after ${timeoutMs}ms`) } = options;

    if (signal?.aborted) {
        return Promise.reject(new CancelledError());
    }

    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
        let settled = false;

        const finish = (settle: () => void) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
            settle();
        };

        const onAbort = () => {
            controller.abort();
            finish(() => reject(new CancelledError()));
        };

        const timer = setTimeout(() => {
            controller.abort();
            finish(() => reject(onTimeout()));
        }, timeoutMs);

        signal?.addEventListener('abort', onAbort, { once: true });

        Promise.resolve().then(() => task(controller.signal)).then(
            (value) => finish(() => resolve(value)),
            (error: unknown) => finish(() => reject(error))
        );
    });
}

/**
 * 检查外部取消信号
 */
export function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancelledError();
    }
}
