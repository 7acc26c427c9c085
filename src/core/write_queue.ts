/**
 * 按 key 串行化的写队列
 * 同一 key 的任务按提交顺序依次执行；不同 key 之间没有共享锁
 */
export class KeyedWriteQueue {
    private tails: Map<string, Promise<void>> = new Map();

    run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(() => task());

        // 前一个任务失败不影响后续任务
        const tail: Promise<void> = result
            .then(
                () => undefined,
                () => undefined
            )
            .then(() => {
                if (this.tails.get(key) === tail) {
                    this.tails.delete(key);
                }
            });
        this.tails.set(key, tail);

        return result;
    }

    /**
     * 当前有排队任务的 key 数量
     */
    get activeKeys(): number {
        return this.tails.size;
    }

    /**
     * 等待全部已提交任务结束
     */
    async drain(): Promise<void> {
        await Promise.all([...this.tails.values()]);
    }
}
