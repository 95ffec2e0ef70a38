import {setTimeout as sleep} from 'node:timers/promises'
import {RetryLimitExceededException, TransientStoreException} from './exception/PersistenceExceptions'

/**
 * 試行をまとめて実行する戦略
 */
export interface ExecutionStrategy {
    /**
     * operation を実行する。一時的な障害なら operation 全体をやり直す。
     */
    execute<T>(operation: (attempt: number) => Promise<T>): Promise<T>
}

/**
 * 設定から渡されるリトライの回数と間隔
 */
export interface RetrySettings {
    /** 最初の試行を除いたリトライ回数 */
    maxRetryCount: number
    /** 1 回目のリトライまでの待ち時間。以降は 2 倍ずつ増える */
    baseDelayMs: number
}

export const RetrySettingsToken = Symbol('RetrySettings')

export interface RetryOptions extends RetrySettings {
    /** 一時的な障害かどうかの判定 */
    isTransient: (error: unknown) => boolean
    /** リトライする直前に呼ばれる */
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

export function isTransientStoreError(error: unknown): boolean {
    return error instanceof TransientStoreException
}

/**
 * 指数バックオフでやり直す実行戦略
 *
 * 【動作】
 * 1. operation を実行する
 * 2. 一時的な障害ならバックオフして 1 からやり直す
 * 3. それ以外の例外はそのまま投げる
 * 4. リトライ回数を使い切ったら RetryLimitExceededException を投げる
 */
export class RetryingExecutionStrategy implements ExecutionStrategy {
    constructor(private readonly options: RetryOptions) {}

    async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
        const maxAttempts = this.options.maxRetryCount + 1

        for (let attempt = 1; ; attempt++) {
            try {
                return await operation(attempt)
            } catch (error) {
                if (!this.options.isTransient(error)) {
                    throw error
                }
                if (attempt >= maxAttempts) {
                    throw new RetryLimitExceededException(attempt, error)
                }

                const delayMs = this.options.baseDelayMs * 2 ** (attempt - 1)
                this.options.onRetry?.(error, attempt, delayMs)
                if (delayMs > 0) {
                    await sleep(delayMs)
                }
            }
        }
    }
}
