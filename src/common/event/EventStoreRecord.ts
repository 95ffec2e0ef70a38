import {randomUUID} from 'node:crypto'
import {serializeEvent} from './DomainEvent'
import type {DomainEvent} from './DomainEvent'

/**
 * イベントストアに追記されるレコード
 *
 * 【いつ作られるか】
 * コミット直前のイベント収集（EventCapture）で、ドメインイベント 1 件につき 1 件。
 *
 * 【いつ保存されるか】
 * 書き込みストアのトランザクションがコミットされた後だけ。
 * 追記専用で、このパイプラインが更新・削除することはない。
 */
export class EventStoreRecord {
    constructor(
        public readonly id: string,
        public readonly aggregateId: string,
        public readonly messageType: string,
        public readonly data: string,
        public readonly occurredOn: Date
    ) {}

    static fromEvent(event: DomainEvent): EventStoreRecord {
        return new EventStoreRecord(
            randomUUID(),
            event.aggregateId,
            event.eventType,
            serializeEvent(event),
            event.occurredOn
        )
    }
}
