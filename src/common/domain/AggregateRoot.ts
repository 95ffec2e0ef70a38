import type {DomainEvent} from '../event/DomainEvent'

/**
 * 集約ルートの基底クラス
 *
 * 【役割】
 * - 集約の識別子を保持する
 * - 業務操作で発生したドメインイベントを「未発行キュー」に溜める
 *
 * 【キューの所有権】
 * キューはこのインスタンスだけが持つ。外部から中身を書き換えることはできず、
 * コミット処理（EventCapture）が読み出して空にする。
 *
 * ```typescript
 * class Customer extends AggregateRoot {
 *     changeEmail(email: string): void {
 *         this.email = email
 *         this.addDomainEvent(new CustomerUpdatedEvent(...))
 *     }
 * }
 * ```
 */
export abstract class AggregateRoot {
    /**
     * 集約の種類（例: 'Customer'）
     * 書き込みストアのテーブル選択とイベントハンドラーの検索に使う
     */
    abstract readonly aggregateType: string

    private pendingEvents: DomainEvent[] = []

    protected constructor(public readonly id: string) {}

    /**
     * 未発行のドメインイベント（キューに積まれた順）
     */
    get domainEvents(): readonly DomainEvent[] {
        return this.pendingEvents
    }

    protected addDomainEvent(event: DomainEvent): void {
        this.pendingEvents.push(event)
    }

    clearDomainEvents(): void {
        this.pendingEvents = []
    }

    /**
     * ロールバックされた試行で取り出したイベントをキューの先頭に戻す
     *
     * 取り出した後に新しく積まれたイベントがあれば、その前に並ぶ。
     */
    requeueDomainEvents(events: readonly DomainEvent[]): void {
        this.pendingEvents = [...events, ...this.pendingEvents]
    }
}
