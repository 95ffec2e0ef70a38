import {inject, injectable} from 'tsyringe'
import type {Logger} from '../logging/Logger'
import {LoggerToken} from '../logging/Logger'
import type {DomainEvent, EventKind} from './DomainEvent'

/**
 * イベントハンドラーの型定義
 *
 * @example
 * ```typescript
 * const handler: EventHandler<CustomerCreatedEvent> = async (event) => {
 *   await projectionHandler.onCreated(event)
 * }
 * ```
 */
export type EventHandler<T extends DomainEvent> = (event: T) => Promise<void>

/**
 * 1 つのハンドラー呼び出しの失敗
 */
export interface HandlerFailure {
    readonly event: DomainEvent
    readonly reason: unknown
}

interface StreamOutcome {
    readonly failures: readonly HandlerFailure[]
    readonly skipped: readonly DomainEvent[]
}

/**
 * publish 中に 1 つ以上のハンドラーが失敗したことを表す例外
 *
 * 全てのハンドラーが終わってから投げられる。成功したハンドラーの
 * 副作用は取り消されない。
 */
export class EventDispatchException extends Error {
    public readonly failures: readonly HandlerFailure[]
    /** 同じ集約の先行イベントが失敗したため配信しなかったイベント */
    public readonly skipped: readonly DomainEvent[]

    constructor(failures: readonly HandlerFailure[], skipped: readonly DomainEvent[] = []) {
        const first = failures[0]
        const firstMessage = first?.reason instanceof Error ? first.reason.message : String(first?.reason)

        super(
            `${String(failures.length)} event handler(s) failed; ` +
            `first: ${first ? first.event.eventType : 'unknown'} (${firstMessage})`
        )

        this.name = 'EventDispatchException'
        this.failures = failures
        this.skipped = skipped
    }
}

/**
 * ハンドラー検索表のキー（集約の種類 × イベントの種類）
 */
function handlerKey(aggregateType: string, eventKind: EventKind): string {
    return `${aggregateType}:${eventKind}`
}

/**
 * イベントディスパッチャー（Pub/Sub パターンの実装）
 *
 * 【役割】
 * - ハンドラーの登録（subscribe）
 * - コミット済みイベントの配信（publish）
 *
 * 【配信の約束事】
 * 1. （集約の種類, イベントの種類）で登録されたハンドラーを全て呼ぶ
 * 2. 集約が違うイベントは並行に配信し、全てが終わるまで待つ
 * 3. 1 つでも失敗したら、全て終わった後で EventDispatchException を投げる
 * 4. 1 回の publish で、同じイベントに同じハンドラーを 2 回呼ばない
 *
 * 別々の publish（別々のコミット）の間の順番は保証しない。
 *
 * イベントストアへの保存はここでは行わない（UnitOfWork の責務）。
 */
@injectable()
export class EventDispatcher {
    /**
     * キーごとのハンドラー
     *
     * Set なので同じハンドラーを 2 回登録しても 1 回しか呼ばれない。
     */
    private readonly handlers = new Map<string, Set<EventHandler<DomainEvent>>>()

    private readonly logger: Logger

    constructor(@inject(LoggerToken) logger: Logger) {
        this.logger = logger.child({component: 'EventDispatcher'})
    }

    /**
     * イベントを購読する
     *
     * @example
     * ```typescript
     * dispatcher.subscribe<CustomerCreatedEvent>(
     *     'Customer',
     *     'created',
     *     (event) => projectionHandler.onCreated(event)
     * )
     * ```
     */
    subscribe<T extends DomainEvent>(
        aggregateType: string,
        eventKind: T['eventKind'],
        handler: EventHandler<T>
    ): void {
        const key = handlerKey(aggregateType, eventKind)
        const handlers = this.handlers.get(key) ?? new Set<EventHandler<DomainEvent>>()

        // 登録側が aggregateType / eventKind で型を保証する
        handlers.add(handler as EventHandler<DomainEvent>)
        this.handlers.set(key, handlers)

        this.logger.debug({key}, '📝 Subscribed to event')
    }

    /**
     * イベントを配信する
     *
     * 【並行性】
     * - 集約（aggregateType + aggregateId）ごとにグループを作り、グループ同士は並行に進める
     * - 同じ集約のイベントは渡された順に 1 件ずつ処理する（読み取りモデルが
     *   イベント列の途中の状態を飛ばしたり、逆順に適用したりしないため）
     * - 1 件のイベントに対するハンドラー同士は並行に呼ぶ
     *
     * ある集約のイベントでハンドラーが失敗したら、その集約の後続イベントは配信しない。
     * 他の集約の配信は最後まで続ける。
     * 配信しなかったイベントは EventDispatchException.skipped に入る。どれもイベントストアには
     * 保存済みなので、読み取りモデルはイベントストアと突き合わせて追いつかせる必要がある。
     *
     * @throws EventDispatchException 1 つ以上のハンドラーが失敗した場合
     */
    async publish(events: readonly DomainEvent[]): Promise<void> {
        const streams = this.groupByAggregate(events)

        if (streams.length === 0) {
            return
        }

        this.logger.info(
            {events: events.length, aggregates: streams.length},
            '📤 Publishing domain events'
        )

        const outcomes = await Promise.all(streams.map((stream) => this.dispatchStream(stream)))

        const failures = outcomes.flatMap((outcome) => outcome.failures)
        const skipped = outcomes.flatMap((outcome) => outcome.skipped)

        if (failures.length > 0) {
            throw new EventDispatchException(failures, skipped)
        }
    }

    /**
     * 全てのハンドラーをクリア（主にテスト用）
     */
    clear(): void {
        this.handlers.clear()
    }

    /**
     * 1 つの集約のイベント列を順番に配信する
     *
     * 例外は投げず、失敗と未配信のイベントを結果として返す。
     */
    private async dispatchStream(stream: readonly DomainEvent[]): Promise<StreamOutcome> {
        for (const [index, event] of stream.entries()) {
            const handlers = this.handlersFor(event)
            const results = await Promise.allSettled(handlers.map((handler) => handler(event)))

            const failures: HandlerFailure[] = []
            results.forEach((result) => {
                if (result.status === 'rejected') {
                    this.logger.error(
                        {err: result.reason, eventType: event.eventType, eventId: event.eventId},
                        '❌ Event handler failed'
                    )
                    failures.push({event, reason: result.reason})
                }
            })

            if (failures.length > 0) {
                return {failures, skipped: stream.slice(index + 1)}
            }
        }

        return {failures: [], skipped: []}
    }

    /**
     * ハンドラーが 1 つ以上あるイベントだけを、集約ごとに順番を保ってまとめる
     */
    private groupByAggregate(events: readonly DomainEvent[]): DomainEvent[][] {
        const streams = new Map<string, DomainEvent[]>()

        events.forEach((event) => {
            if (this.handlersFor(event).length === 0) {
                return
            }
            const key = `${event.aggregateType}:${event.aggregateId}`
            const stream = streams.get(key) ?? []
            stream.push(event)
            streams.set(key, stream)
        })

        return [...streams.values()]
    }

    private handlersFor(event: DomainEvent): EventHandler<DomainEvent>[] {
        const handlers = this.handlers.get(handlerKey(event.aggregateType, event.eventKind))
        return handlers ? [...handlers] : []
    }
}
