import {injectable} from 'tsyringe'
import type {EventStoreRecord} from '../EventStoreRecord'
import type {EventStorePort} from '../port/EventStorePort'

/**
 * インメモリ実装のイベントストア
 *
 * 【用途】
 * - 開発環境でのクイックテスト
 * - 単体テスト・統合テスト
 *
 * 【注意】
 * - 本番環境では使用しない
 * - プロセスをまたいで共有できない
 */
@injectable()
export class InMemoryEventStoreAdapter implements EventStorePort {
    /**
     * 追記順のレコード
     */
    private readonly records: EventStoreRecord[] = []

    store(records: readonly EventStoreRecord[]): Promise<void> {
        for (const record of records) {
            this.records.push(record)
        }
        return Promise.resolve()
    }

    findByAggregateId(aggregateId: string): Promise<EventStoreRecord[]> {
        return Promise.resolve(
            this.records.filter((record) => record.aggregateId === aggregateId)
        )
    }

    dispose(): Promise<void> {
        return Promise.resolve()
    }

    /**
     * 全てのレコード（テスト用）
     */
    all(): readonly EventStoreRecord[] {
        return this.records
    }

    /**
     * 全てのレコードをクリア（テスト用）
     */
    clear(): void {
        this.records.length = 0
    }
}
