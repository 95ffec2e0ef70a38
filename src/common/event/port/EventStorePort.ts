import type {EventStoreRecord} from '../EventStoreRecord'

/**
 * イベントストアのポート（インターフェース）
 *
 * 【役割】
 * コミット済みのドメインイベントを追記専用のログとして永続化する。
 *
 * 【約束事】
 * - 渡された順番を変えずに追記する
 * - 内部でリトライしない（リトライするかどうかは呼び出し側が決める）
 * - 1 件ずつ独立に追記するので、途中で失敗すると先頭の一部だけが残ることがある
 */
export interface EventStorePort {
    /**
     * レコードを順番に追記する
     *
     * @throws Error 接続やシリアライズに失敗した場合
     *
     * @example
     * ```typescript
     * await eventStore.store(captured.eventStoreRecords)
     * ```
     */
    store(records: readonly EventStoreRecord[]): Promise<void>

    /**
     * 集約IDでレコードを取得する（追記順）
     *
     * 書き込みストアとの突き合わせ（リコンシリエーション）や監査で使う。
     */
    findByAggregateId(aggregateId: string): Promise<EventStoreRecord[]>

    /**
     * 保持している接続などを解放する
     */
    dispose(): Promise<void>
}

export const EventStorePortToken = Symbol('EventStorePort')
