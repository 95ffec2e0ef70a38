import {randomUUID} from 'node:crypto'
import {inject, injectable} from 'tsyringe'
import type {Logger} from '../../logging/Logger'
import {LoggerToken} from '../../logging/Logger'
import {PersisterRegistry} from '../AggregatePersister'
import type {WriteRow} from '../AggregatePersister'
import {ChangeTracker} from '../ChangeTracker'
import {isTransientStoreError, RetryingExecutionStrategy, RetrySettingsToken} from '../ExecutionStrategy'
import type {ExecutionStrategy, RetrySettings} from '../ExecutionStrategy'
import {WriteConflictException} from '../exception/PersistenceExceptions'
import type {IsolationLevel, StoreTransaction, WriteStorePort} from '../port/WriteStorePort'
import {InMemoryWriteDatabase} from './InMemoryWriteDatabase'
import type {PendingWrite} from './InMemoryWriteDatabase'

/**
 * インメモリのトランザクション
 *
 * saveChanges で作られた書き込みを保留し、commit で初めて反映する。
 * rollback すると保留中の書き込みは捨てられ、何も残らない。
 */
class InMemoryTransaction implements StoreTransaction {
    readonly transactionId = randomUUID()
    private pending: PendingWrite[] = []
    private completed = false

    constructor(
        readonly isolationLevel: IsolationLevel,
        private readonly apply: (writes: readonly PendingWrite[]) => void
    ) {}

    stage(writes: readonly PendingWrite[]): void {
        this.ensureActive()
        this.pending.push(...writes)
    }

    staged(): readonly PendingWrite[] {
        return this.pending
    }

    commit(): Promise<void> {
        this.ensureActive()
        this.apply(this.pending)
        this.completed = true
        return Promise.resolve()
    }

    rollback(): Promise<void> {
        this.ensureActive()
        this.pending = []
        this.completed = true
        return Promise.resolve()
    }

    private ensureActive(): void {
        if (this.completed) {
            throw new Error(`Transaction '${this.transactionId}' has already completed`)
        }
    }
}

/**
 * インメモリ実装の書き込みストア
 *
 * 【用途】
 * - 開発環境でのクイックテスト
 * - 単体テスト・統合テスト
 *
 * 【特徴】
 * - 行そのものは共有の InMemoryWriteDatabase が持ち、このアダプターは
 *   作業単位ごとの ChangeTracker とトランザクションだけを持つ
 * - Persister が宣言した一意列をコミット前に検査する（WriteConflictException）
 * - 一時的な障害は起きないが、実行戦略は本番と同じものを使う
 */
@injectable()
export class InMemoryWriteStoreAdapter implements WriteStorePort {
    readonly changeTracker = new ChangeTracker()

    private readonly logger: Logger

    constructor(
        @inject(InMemoryWriteDatabase)
        private readonly database: InMemoryWriteDatabase,
        @inject(PersisterRegistry)
        private readonly persisters: PersisterRegistry,
        @inject(RetrySettingsToken)
        private readonly retrySettings: RetrySettings,
        @inject(LoggerToken)
        logger: Logger
    ) {
        this.logger = logger.child({component: 'InMemoryWriteStore'})
    }

    createExecutionStrategy(): ExecutionStrategy {
        return new RetryingExecutionStrategy({
            ...this.retrySettings,
            isTransient: isTransientStoreError,
            onRetry: (error, attempt, delayMs) => {
                this.logger.warn({err: error, attempt, delayMs}, '🔁 Retrying transaction')
            },
        })
    }

    beginTransaction(isolationLevel: IsolationLevel): Promise<StoreTransaction> {
        return Promise.resolve(
            new InMemoryTransaction(isolationLevel, (writes) => {
                this.database.apply(writes)
            })
        )
    }

    saveChanges(transaction: StoreTransaction): Promise<number> {
        if (!(transaction instanceof InMemoryTransaction)) {
            return Promise.reject(new Error('Transaction was not started by this store'))
        }

        const writes = this.changeTracker.changes().map(({aggregate, state}): PendingWrite => {
            const persister = this.persisters.get(aggregate.aggregateType)
            if (state === 'deleted') {
                return {kind: 'delete', table: persister.tableName, id: aggregate.id}
            }
            return {kind: 'upsert', table: persister.tableName, id: aggregate.id, row: persister.toRow(aggregate)}
        })

        try {
            this.checkUniqueness([...transaction.staged(), ...writes])
        } catch (error) {
            return Promise.reject(error)
        }

        transaction.stage(writes)
        return Promise.resolve(writes.length)
    }

    /**
     * コミットされなかった追跡中の変更を捨てる
     */
    dispose(): Promise<void> {
        this.changeTracker.acceptChanges()
        return Promise.resolve()
    }

    findRow(table: string, id: string): Promise<WriteRow | undefined> {
        return Promise.resolve(this.database.find(table, id))
    }

    findRowsBy(table: string, column: string, value: WriteRow[string]): Promise<WriteRow[]> {
        return Promise.resolve(this.database.findBy(table, column, value))
    }

    /**
     * コミット済みの行に保留中の書き込みを重ねた状態で、一意列の重複を検査する
     */
    private checkUniqueness(writes: readonly PendingWrite[]): void {
        const projected = this.database.preview(writes)

        writes.forEach((write) => {
            if (write.kind === 'delete') {
                return
            }
            const rows = projected.get(write.table)
            const persister = this.persisters.findByTable(write.table)
            persister?.uniqueColumns.forEach((column) => {
                const value = write.row[column]
                const duplicate = [...(rows?.entries() ?? [])].find(
                    ([id, row]) => id !== write.id && row[column] === value
                )
                if (duplicate) {
                    throw new WriteConflictException(
                        `${write.table}.${column}`,
                        `Duplicate value for ${write.table}.${column}: ${String(value)}`
                    )
                }
            })
        })
    }
}
