/**
 * 一時的な障害（接続断・デッドロック・シリアライズ失敗など）
 *
 * 実行戦略がこの例外を見ると、試行全体をやり直す。
 */
export class TransientStoreException extends Error {
    constructor(message: string, options?: {cause?: unknown}) {
        super(message, options)
        this.name = 'TransientStoreException'
    }
}

/**
 * 一意制約などの整合性違反
 *
 * リトライしても結果は変わらないので、ロールバックして呼び出し元に返す。
 */
export class WriteConflictException extends Error {
    public readonly constraint: string

    constructor(constraint: string, message: string, options?: {cause?: unknown}) {
        super(message, options)
        this.name = 'WriteConflictException'
        this.constraint = constraint
    }
}

/**
 * リトライ回数を使い切った
 *
 * cause に最後の試行の例外が入る。
 */
export class RetryLimitExceededException extends Error {
    public readonly attempts: number

    constructor(attempts: number, cause: unknown) {
        super(
            `Commit failed after ${String(attempts)} attempt(s): ` +
            `${cause instanceof Error ? cause.message : String(cause)}`,
            {cause}
        )
        this.name = 'RetryLimitExceededException'
        this.attempts = attempts
    }
}

/**
 * コミット後の伝播（イベントストア保存・イベント配信）の失敗
 *
 * 【重要】
 * この例外が投げられた時点で、書き込みストアのトランザクションは
 * 既にコミット済み。ロールバックはしない。
 * イベントストアや読み取りストアとの突き合わせが別途必要になる。
 */
export class EventPropagationException extends Error {
    public readonly transactionId: string
    public readonly phase: 'store' | 'publish'

    constructor(transactionId: string, phase: 'store' | 'publish', cause: unknown) {
        super(
            `Transaction '${transactionId}' committed but event ${phase} failed: ` +
            `${cause instanceof Error ? cause.message : String(cause)}`,
            {cause}
        )
        this.name = 'EventPropagationException'
        this.transactionId = transactionId
        this.phase = phase
    }
}
