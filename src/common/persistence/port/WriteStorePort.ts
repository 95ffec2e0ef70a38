import type {WriteRow} from '../AggregatePersister'
import type {ChangeTracker} from '../ChangeTracker'
import type {ExecutionStrategy} from '../ExecutionStrategy'

/**
 * トランザクション分離レベル
 *
 * このパイプラインは read committed 以上を前提にしない。
 */
export type IsolationLevel = 'read committed'

/**
 * 書き込みストアのトランザクション（1 回のコミット試行）
 */
export interface StoreTransaction {
    /** ログで試行を追跡するための識別子 */
    readonly transactionId: string
    readonly isolationLevel: IsolationLevel
    commit(): Promise<void>
    rollback(): Promise<void>
}

/**
 * 書き込みストア（正規化されたトランザクショナルストア）のポート
 *
 * 【役割】
 * - 変更された集約の追跡（changeTracker）
 * - リトライ可能な実行戦略の提供
 * - トランザクションの開始と、追跡中の変更の書き込み
 *
 * 【実装】
 * - InMemoryWriteStoreAdapter: 開発・テスト用
 * - PostgresWriteStoreAdapter: 本番用（pg）
 */
export interface WriteStorePort {
    readonly changeTracker: ChangeTracker

    /**
     * 一時的な障害（接続断・デッドロックなど）で試行全体をやり直す実行戦略
     */
    createExecutionStrategy(): ExecutionStrategy

    beginTransaction(isolationLevel: IsolationLevel): Promise<StoreTransaction>

    /**
     * 追跡中の変更をトランザクション内で書き込む
     *
     * 追跡情報はここでは消さない。コミット後に changeTracker.acceptChanges() で消す。
     *
     * @returns 影響を受けた行数
     */
    saveChanges(transaction: StoreTransaction): Promise<number>

    /**
     * コミット済みの行を ID で取得する（トランザクション外の読み取り）
     */
    findRow(table: string, id: string): Promise<WriteRow | undefined>

    /**
     * コミット済みの行を列の値で検索する
     */
    findRowsBy(table: string, column: string, value: WriteRow[string]): Promise<WriteRow[]>

    dispose(): Promise<void>
}

export const WriteStorePortToken = Symbol('WriteStorePort')
