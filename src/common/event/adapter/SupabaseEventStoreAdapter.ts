import type {SupabaseClient} from '@supabase/supabase-js'
import {inject, injectable} from 'tsyringe'
import {z} from 'zod'
import {SupabaseClientToken} from '../../../config/types'
import {EventStoreRecord} from '../EventStoreRecord'
import type {EventStorePort} from '../port/EventStorePort'

/**
 * event_stores テーブルの 1 行
 */
const EventStoreRowSchema = z.object({
    id: z.string(),
    aggregate_id: z.string(),
    message_type: z.string(),
    data: z.string(),
    occurred_on: z.string(),
})

type EventStoreRow = z.infer<typeof EventStoreRowSchema>

export const EVENT_STORE_TABLE = 'event_stores'

/**
 * Supabaseを使ったイベントストアの実装
 *
 * 【役割】
 * - イベントストアレコードを event_stores テーブルに追記する
 * - 集約IDでレコードを取得する
 *
 * 【実装のポイント】
 * 1. 1 件ずつ INSERT する
 *    - 渡された順番がそのまま追記順になる
 *    - 途中で失敗した場合、それより前のレコードは残る
 *
 * 2. data 列にはシリアライズ済みの JSON 文字列をそのまま入れる
 *
 * 3. エラーハンドリング
 *    - Supabaseのエラーは Error に包んで上位層に伝播する
 *    - リトライはしない
 */
@injectable()
export class SupabaseEventStoreAdapter implements EventStorePort {
    constructor(
        @inject(SupabaseClientToken)
        private readonly supabaseClient: SupabaseClient
    ) {}

    async store(records: readonly EventStoreRecord[]): Promise<void> {
        for (const record of records) {
            const {error} = await this.supabaseClient
                .from(EVENT_STORE_TABLE)
                .insert(this.toRow(record))

            if (error) {
                throw new Error(
                    `Failed to append event ${record.messageType} (${record.id}): ${error.message}`
                )
            }
        }
    }

    async findByAggregateId(aggregateId: string): Promise<EventStoreRecord[]> {
        const {data, error} = await this.supabaseClient
            .from(EVENT_STORE_TABLE)
            .select('*')
            .eq('aggregate_id', aggregateId)
            // 追記順（seq は挿入時に採番される）
            .order('seq', {ascending: true})

        if (error) {
            throw new Error(`Failed to find events: ${error.message}`)
        }

        return z.array(EventStoreRowSchema).parse(data).map((row) => this.fromRow(row))
    }

    /**
     * Supabase クライアントは HTTP ベースで、閉じるべき接続を持たない
     */
    dispose(): Promise<void> {
        return Promise.resolve()
    }

    private toRow(record: EventStoreRecord): EventStoreRow {
        return {
            id: record.id,
            aggregate_id: record.aggregateId,
            message_type: record.messageType,
            data: record.data,
            occurred_on: record.occurredOn.toISOString(),
        }
    }

    private fromRow(row: EventStoreRow): EventStoreRecord {
        return new EventStoreRecord(
            row.id,
            row.aggregate_id,
            row.message_type,
            row.data,
            new Date(row.occurred_on)
        )
    }
}
