import {randomUUID} from 'node:crypto'
import type {QueryResultRow} from 'pg'
import {inject, injectable} from 'tsyringe'
import {PgPoolToken} from '../../../config/types'
import type {Logger} from '../../logging/Logger'
import {LoggerToken} from '../../logging/Logger'
import {PersisterRegistry} from '../AggregatePersister'
import type {WriteRow} from '../AggregatePersister'
import {ChangeTracker} from '../ChangeTracker'
import {isTransientStoreError, RetryingExecutionStrategy, RetrySettingsToken} from '../ExecutionStrategy'
import type {ExecutionStrategy, RetrySettings} from '../ExecutionStrategy'
import {TransientStoreException, WriteConflictException} from '../exception/PersistenceExceptions'
import type {IsolationLevel, StoreTransaction, WriteStorePort} from '../port/WriteStorePort'

/**
 * PostgreSQL のエラーコード
 */
export const PostgresErrorCodes = {
    UNIQUE_VIOLATION: '23505',
    SERIALIZATION_FAILURE: '40001',
    DEADLOCK_DETECTED: '40P01',
    ADMIN_SHUTDOWN: '57P01',
} as const

/**
 * パラメータ付き SQL
 */
export interface SqlStatement {
    text: string
    values: WriteRow[string][]
}

function isPostgresError(error: unknown): error is {code: string; message: string; constraint?: string} {
    return typeof error === 'object' && error !== null && 'code' in error && 'message' in error
        && typeof error.code === 'string'
}

function quoteIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`
}

/**
 * pg / ネットワークのエラーを、実行戦略が判断できる例外に変換する
 *
 * - 40001, 40P01, 57P01, 08xxx → TransientStoreException（リトライ対象）
 * - 23505 → WriteConflictException
 * - ECONNREFUSED / ECONNRESET → TransientStoreException
 * - それ以外 → そのまま
 */
export function translatePostgresError(error: unknown): unknown {
    if (!isPostgresError(error)) {
        return error
    }

    const {code, message} = error

    if (
        code === PostgresErrorCodes.SERIALIZATION_FAILURE ||
        code === PostgresErrorCodes.DEADLOCK_DETECTED ||
        code === PostgresErrorCodes.ADMIN_SHUTDOWN ||
        code.startsWith('08') ||
        code === 'ECONNREFUSED' ||
        code === 'ECONNRESET'
    ) {
        return new TransientStoreException(message, {cause: error})
    }

    if (code === PostgresErrorCodes.UNIQUE_VIOLATION) {
        return new WriteConflictException(error.constraint ?? 'unique', message, {cause: error})
    }

    return error
}

/**
 * id 列を主キーとした UPSERT 文を組み立てる
 *
 * ```sql
 * INSERT INTO "customers" ("id", "email") VALUES ($1, $2)
 * ON CONFLICT ("id") DO UPDATE SET "email" = EXCLUDED."email"
 * ```
 */
export function buildUpsertStatement(tableName: string, row: WriteRow): SqlStatement {
    const columns = Object.keys(row)
    const placeholders = columns.map((_, index) => `$${String(index + 1)}`)
    const updates = columns
        .filter((column) => column !== 'id')
        .map((column) => `${quoteIdentifier(column)} = EXCLUDED.${quoteIdentifier(column)}`)

    const conflict = updates.length > 0 ? `DO UPDATE SET ${updates.join(', ')}` : 'DO NOTHING'

    return {
        text:
            `INSERT INTO ${quoteIdentifier(tableName)} (${columns.map(quoteIdentifier).join(', ')}) ` +
            `VALUES (${placeholders.join(', ')}) ON CONFLICT ("id") ${conflict}`,
        values: columns.map((column) => row[column] ?? null),
    }
}

export function buildDeleteStatement(tableName: string, id: string): SqlStatement {
    return {
        text: `DELETE FROM ${quoteIdentifier(tableName)} WHERE "id" = $1`,
        values: [id],
    }
}

/**
 * アダプターが使う pg の操作（pg の Pool / PoolClient がそのまま満たす）
 */
export interface PgQueryable {
    query(text: string, values?: unknown[]): Promise<{rows: QueryResultRow[]; rowCount: number | null}>
}

export interface PgTransactionClient extends PgQueryable {
    /** true を渡すと接続をプールに戻さず破棄する */
    release(destroy?: boolean): void
}

export interface PgPool extends PgQueryable {
    connect(): Promise<PgTransactionClient>
}

/**
 * 1 つのプール接続を占有するトランザクション
 *
 * 【接続の返却】
 * - COMMIT 成功: その場で返す
 * - COMMIT 失敗: 接続を持ったまま。呼び出し側の rollback() で返す
 * - ROLLBACK 失敗: 状態が分からないので破棄する
 */
class PostgresTransaction implements StoreTransaction {
    readonly transactionId = randomUUID()
    private released = false

    constructor(
        readonly isolationLevel: IsolationLevel,
        readonly client: PgTransactionClient
    ) {}

    async commit(): Promise<void> {
        try {
            await this.client.query('COMMIT')
        } catch (error) {
            throw translatePostgresError(error)
        }
        this.release(false)
    }

    async rollback(): Promise<void> {
        if (this.released) {
            return
        }

        try {
            await this.client.query('ROLLBACK')
        } catch (error) {
            this.release(true)
            throw error
        }
        this.release(false)
    }

    private release(destroy: boolean): void {
        if (!this.released) {
            this.released = true
            this.client.release(destroy)
        }
    }
}

function toWriteRow(row: QueryResultRow): WriteRow {
    const result: WriteRow = {}
    Object.entries(row).forEach(([column, value]) => {
        if (value instanceof Date) {
            result[column] = value.toISOString()
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value === null) {
            result[column] = value
        } else {
            result[column] = String(value)
        }
    })
    return result
}

/**
 * PostgreSQL（pg）を使った書き込みストアの実装
 *
 * 【スコープ】
 * リクエストごとに 1 インスタンス（ChangeTracker を持つため）。プールは共有。
 *
 * 【トランザクション】
 * プールから接続を 1 本借り、`BEGIN ISOLATION LEVEL READ COMMITTED` で開始する。
 *
 * 【エラーハンドリング】
 * pg のエラーコードを translatePostgresError で変換し、
 * 一時的な障害だけを実行戦略にリトライさせる。
 */
@injectable()
export class PostgresWriteStoreAdapter implements WriteStorePort {
    readonly changeTracker = new ChangeTracker()

    private readonly logger: Logger

    constructor(
        @inject(PgPoolToken)
        private readonly pool: PgPool,
        @inject(PersisterRegistry)
        private readonly persisters: PersisterRegistry,
        @inject(RetrySettingsToken)
        private readonly retrySettings: RetrySettings,
        @inject(LoggerToken)
        logger: Logger
    ) {
        this.logger = logger.child({component: 'PostgresWriteStore'})
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

    async beginTransaction(isolationLevel: IsolationLevel): Promise<StoreTransaction> {
        let client: PgTransactionClient
        try {
            client = await this.pool.connect()
        } catch (error) {
            throw translatePostgresError(error)
        }

        try {
            await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel.toUpperCase()}`)
        } catch (error) {
            client.release(true)
            throw translatePostgresError(error)
        }

        return new PostgresTransaction(isolationLevel, client)
    }

    async saveChanges(transaction: StoreTransaction): Promise<number> {
        if (!(transaction instanceof PostgresTransaction)) {
            throw new Error('Transaction was not started by this store')
        }

        let rowsAffected = 0

        for (const {aggregate, state} of this.changeTracker.changes()) {
            const persister = this.persisters.get(aggregate.aggregateType)
            const statement = state === 'deleted'
                ? buildDeleteStatement(persister.tableName, aggregate.id)
                : buildUpsertStatement(persister.tableName, persister.toRow(aggregate))

            try {
                const result = await transaction.client.query(statement.text, statement.values)
                rowsAffected += result.rowCount ?? 0
            } catch (error) {
                throw translatePostgresError(error)
            }
        }

        return rowsAffected
    }

    async findRow(table: string, id: string): Promise<WriteRow | undefined> {
        const result = await this.pool.query(
            `SELECT * FROM ${quoteIdentifier(table)} WHERE "id" = $1`,
            [id]
        )
        const row = result.rows[0]
        return row ? toWriteRow(row) : undefined
    }

    async findRowsBy(table: string, column: string, value: WriteRow[string]): Promise<WriteRow[]> {
        const result = await this.pool.query(
            `SELECT * FROM ${quoteIdentifier(table)} WHERE ${quoteIdentifier(column)} = $1`,
            [value]
        )
        return result.rows.map(toWriteRow)
    }

    /**
     * コミットされなかった追跡中の変更を捨てる
     *
     * プールはアプリケーション全体で共有しているので、ここでは閉じない（server.ts で閉じる）。
     */
    dispose(): Promise<void> {
        this.changeTracker.acceptChanges()
        return Promise.resolve()
    }
}
