/**
 * ドメインイベントの種類
 *
 * 読み取り側の投影はこの 3 種類だけを区別する。
 */
export type EventKind = 'created' | 'updated' | 'deleted'

/**
 * ドメインイベントの基底インターフェース
 *
 * 【ドメインイベントとは？】
 * 集約に起きた出来事を表す、変更されないオブジェクト。
 *
 * 【書き込み側から読み取り側への流れ】
 * ```
 * Customer.changeEmail() → キューに CustomerUpdatedEvent
 *   → UnitOfWork.commit() → イベントストアに保存
 *   → EventDispatcher → CustomerProjectionHandler → 読み取りストア更新
 * ```
 */
export interface DomainEvent {
    /**
     * イベントの一意な識別子
     */
    readonly eventId: string

    /**
     * イベントが発生した日時
     */
    readonly occurredOn: Date

    /**
     * イベントの型名（例: 'CustomerCreatedEvent'）
     * イベントストアの messageType として保存される
     */
    readonly eventType: string

    /**
     * 発生元の集約の種類（例: 'Customer'）
     */
    readonly aggregateType: string

    /**
     * 発生元の集約ID
     */
    readonly aggregateId: string

    /**
     * EventDispatcher がハンドラーを選ぶためのキー
     * （aggregateType, eventKind）の組で検索する
     */
    readonly eventKind: EventKind
}

/**
 * イベントを JSON 文字列に変換する
 *
 * occurredOn は ISO 文字列になり、イベント固有のプロパティもそのまま含まれる。
 */
export function serializeEvent(event: DomainEvent): string {
    return JSON.stringify({
        ...event,
        occurredOn: event.occurredOn.toISOString(),
    })
}
