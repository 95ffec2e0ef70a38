import {inject, injectable} from 'tsyringe'
import {captureDomainEvents, requeueCapturedEvents} from '../event/EventCapture'
import type {CapturedEvents} from '../event/EventCapture'
import {EventDispatcher} from '../event/EventDispatcher'
import type {EventStorePort} from '../event/port/EventStorePort'
import {EventStorePortToken} from '../event/port/EventStorePort'
import type {Logger} from '../logging/Logger'
import {LoggerToken} from '../logging/Logger'
import {EventPropagationException} from './exception/PersistenceExceptions'
import type {UnitOfWork} from './port/UnitOfWork'
import type {WriteStorePort} from './port/WriteStorePort'
import {WriteStorePortToken} from './port/WriteStorePort'

/**
 * コミットされた 1 回の試行の結果
 */
interface CommittedAttempt {
    readonly transactionId: string
    readonly captured: CapturedEvents
    readonly rowsAffected: number
}

/**
 * トランザクションを使った UnitOfWork の実装
 *
 * 【commit() の流れ】
 * ```
 * 実行戦略（リトライ可能）
 * ┌──────────────────────────────────────────────┐
 * │ ① トランザクション開始（read committed）          │
 * │ ② ドメインイベントの収集（キューは空になる）        │
 * │ ③ 変更の書き込み → コミット                      │
 * │    失敗 → ロールバック、イベントをキューへ戻す      │
 * └──────────────────────────────────────────────┘
 * ④ イベントストアへ保存
 * ⑤ イベントを配信（投影ハンドラーなど）
 * ```
 *
 * 【④⑤ が失敗した場合】
 * 書き込みストアは既にコミット済みなのでロールバックしない。
 * EventPropagationException を投げ、突き合わせは運用側に任せる。
 *
 * 【リトライとの関係】
 * 実行戦略がやり直すのは ①〜③ だけ。④⑤ はコミットした試行の結果を使って
 * 1 回だけ実行される。
 */
@injectable()
export class TransactionalUnitOfWork implements UnitOfWork {
    private readonly logger: Logger
    private disposed = false

    constructor(
        @inject(WriteStorePortToken)
        private readonly writeStore: WriteStorePort,
        @inject(EventStorePortToken)
        private readonly eventStore: EventStorePort,
        @inject(EventDispatcher)
        private readonly dispatcher: EventDispatcher,
        @inject(LoggerToken)
        logger: Logger
    ) {
        this.logger = logger.child({component: 'UnitOfWork'})
    }

    async commit(): Promise<void> {
        const strategy = this.writeStore.createExecutionStrategy()

        const committed = await strategy.execute((attempt) => this.commitAttempt(attempt))

        await this.propagate(committed)

        this.logger.info(
            {transactionId: committed.transactionId, rowsAffected: committed.rowsAffected},
            '✅ Transaction successfully confirmed'
        )
    }

    async dispose(): Promise<void> {
        if (this.disposed) {
            return
        }
        this.disposed = true

        await this.writeStore.dispose()
    }

    /**
     * ①〜③: 1 回のコミット試行
     */
    private async commitAttempt(attempt: number): Promise<CommittedAttempt> {
        const transaction = await this.writeStore.beginTransaction('read committed')
        const {transactionId} = transaction

        this.logger.info({transactionId, attempt}, '🔄 Begin transaction')

        let captured: CapturedEvents | undefined

        try {
            // 物理的な書き込みの前に、追跡中の集約からイベントを収集する
            captured = captureDomainEvents(this.writeStore.changeTracker.aggregates())

            const rowsAffected = await this.writeStore.saveChanges(transaction)

            this.logger.info({transactionId}, '💾 Commit transaction')

            await transaction.commit()

            this.writeStore.changeTracker.acceptChanges()

            return {transactionId, captured, rowsAffected}
        } catch (error) {
            this.logger.error(
                {err: error, transactionId},
                '❌ An unexpected exception occurred while committing the transaction'
            )

            try {
                await transaction.rollback()
                this.logger.warn({transactionId}, '↩️  Rollback transaction')
            } catch (rollbackError) {
                // 元の例外を優先して投げる
                this.logger.error({err: rollbackError, transactionId}, '❌ Rollback failed')
            }

            if (captured) {
                requeueCapturedEvents(captured)
            }

            throw error
        }
    }

    /**
     * ④⑤: コミット済みの試行で収集したイベントを保存・配信する
     */
    private async propagate({transactionId, captured}: CommittedAttempt): Promise<void> {
        if (captured.domainEvents.length === 0 || captured.eventStoreRecords.length === 0) {
            return
        }

        try {
            await this.eventStore.store(captured.eventStoreRecords)
        } catch (error) {
            this.logger.error(
                {err: error, transactionId, events: captured.eventStoreRecords.length},
                '❌ Failed to store events after commit'
            )
            throw new EventPropagationException(transactionId, 'store', error)
        }

        try {
            await this.dispatcher.publish(captured.domainEvents)
        } catch (error) {
            this.logger.error(
                {err: error, transactionId, events: captured.domainEvents.length},
                '❌ Failed to publish events after commit'
            )
            throw new EventPropagationException(transactionId, 'publish', error)
        }
    }
}
