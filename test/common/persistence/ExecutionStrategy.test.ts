import {describe, expect, it, vi} from "vitest";
import {
    RetryLimitExceededException,
    TransientStoreException,
    WriteConflictException,
} from "../../../src/common/persistence/exception/PersistenceExceptions";
import {isTransientStoreError, RetryingExecutionStrategy} from "../../../src/common/persistence/ExecutionStrategy";

/**
 * RetryingExecutionStrategy のテスト
 */
describe("RetryingExecutionStrategy", () => {
    it("成功すれば 1 回で結果を返す", async () => {
        const strategy = new RetryingExecutionStrategy({
            maxRetryCount: 3,
            baseDelayMs: 0,
            isTransient: isTransientStoreError,
        });
        const operation = vi.fn((attempt: number) => Promise.resolve(`attempt ${String(attempt)}`));

        await expect(strategy.execute(operation)).resolves.toBe("attempt 1");
        expect(operation).toHaveBeenCalledTimes(1);
    });

    it("一時的な障害なら試行全体をやり直す", async () => {
        const strategy = new RetryingExecutionStrategy({
            maxRetryCount: 3,
            baseDelayMs: 0,
            isTransient: isTransientStoreError,
        });
        const operation = vi
            .fn((attempt: number) => Promise.resolve(attempt))
            .mockRejectedValueOnce(new TransientStoreException("connection reset"))
            .mockRejectedValueOnce(new TransientStoreException("deadlock"));

        await expect(strategy.execute(operation)).resolves.toBe(3);
        expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    });

    it("待ち時間は 2 倍ずつ増える", async () => {
        const delays: number[] = [];
        const strategy = new RetryingExecutionStrategy({
            maxRetryCount: 3,
            baseDelayMs: 1,
            isTransient: isTransientStoreError,
            onRetry: (_error, _attempt, delayMs) => {
                delays.push(delayMs);
            },
        });
        const operation = vi
            .fn(() => Promise.resolve("ok"))
            .mockRejectedValueOnce(new TransientStoreException("1"))
            .mockRejectedValueOnce(new TransientStoreException("2"))
            .mockRejectedValueOnce(new TransientStoreException("3"));

        await strategy.execute(operation);

        expect(delays).toEqual([1, 2, 4]);
    });

    it("一時的でない例外はそのまま投げ、やり直さない", async () => {
        const strategy = new RetryingExecutionStrategy({
            maxRetryCount: 3,
            baseDelayMs: 0,
            isTransient: isTransientStoreError,
        });
        const conflict = new WriteConflictException("customers.email", "duplicate");
        const operation = vi.fn(() => Promise.reject(conflict));

        await expect(strategy.execute(operation)).rejects.toBe(conflict);
        expect(operation).toHaveBeenCalledTimes(1);
    });

    it("リトライ回数を使い切ったら RetryLimitExceededException（cause は最後の例外）", async () => {
        const strategy = new RetryingExecutionStrategy({
            maxRetryCount: 2,
            baseDelayMs: 0,
            isTransient: isTransientStoreError,
        });
        const last = new TransientStoreException("still down");
        const operation = vi
            .fn(() => Promise.reject(last))
            .mockRejectedValueOnce(new TransientStoreException("down"));

        const error: unknown = await strategy.execute(operation).catch((caught: unknown) => caught);

        expect(operation).toHaveBeenCalledTimes(3);
        expect(error).toBeInstanceOf(RetryLimitExceededException);
        if (error instanceof RetryLimitExceededException) {
            expect(error.attempts).toBe(3);
            expect(error.cause).toBe(last);
            expect(error.message).toBe("Commit failed after 3 attempt(s): still down");
        }
    });
});
