import type {AggregateRoot} from '../domain/AggregateRoot'
import type {DomainEvent} from './DomainEvent'
import {EventStoreRecord} from './EventStoreRecord'

/**
 * 取り出したイベントと、その取り出し元の集約
 */
export interface CapturedSource {
    readonly aggregate: AggregateRoot
    readonly events: readonly DomainEvent[]
}

/**
 * 1 回のコミット試行で収集した変更内容
 */
export interface CapturedEvents {
    /** 集約ごとのキュー順を保った全イベント */
    readonly domainEvents: readonly DomainEvent[]
    /** domainEvents と同じ順・同じ件数のイベントストアレコード */
    readonly eventStoreRecords: readonly EventStoreRecord[]
    /** ロールバック時にイベントをキューへ戻すための情報 */
    readonly sources: readonly CapturedSource[]
}

/**
 * 変更された集約から未発行のドメインイベントを収集する
 *
 * 【処理の流れ】
 * 1. イベントを持つ集約だけを対象にする
 * 2. 集約ごとのキュー順を保ってイベントを並べる
 * 3. イベント 1 件につきイベントストアレコードを 1 件作る
 * 4. 対象の集約のキューを全て空にする
 *
 * キュー以外には何も書き込まない。
 */
export function captureDomainEvents(aggregates: Iterable<AggregateRoot>): CapturedEvents {
    const sources: CapturedSource[] = []

    for (const aggregate of aggregates) {
        if (aggregate.domainEvents.length === 0) {
            continue
        }
        sources.push({aggregate, events: [...aggregate.domainEvents]})
    }

    const domainEvents = sources.flatMap((source) => source.events)
    const eventStoreRecords = domainEvents.map((event) => EventStoreRecord.fromEvent(event))

    sources.forEach((source) => {
        source.aggregate.clearDomainEvents()
    })

    return {domainEvents, eventStoreRecords, sources}
}

/**
 * 収集したイベントを取り出し元のキューへ戻す
 *
 * コミットされなかった試行の後に呼ぶ。リトライした試行は同じイベントを
 * ちょうど 1 回だけ収集し直す。
 */
export function requeueCapturedEvents(captured: CapturedEvents): void {
    captured.sources.forEach((source) => {
        source.aggregate.requeueDomainEvents(source.events)
    })
}
