import type {AggregateRoot} from '../domain/AggregateRoot'

/**
 * - detached: 同じ作業単位で追加してから削除した。書き込みは無いがイベントは残っている
 */
export type EntryState = 'added' | 'modified' | 'deleted' | 'detached'

/**
 * 追跡中の集約 1 件
 */
export interface TrackedEntry {
    readonly aggregate: AggregateRoot
    readonly state: EntryState
}

/**
 * この作業単位の中では存在しない扱いにする状態か
 */
export function isRemovedState(state: EntryState): boolean {
    return state === 'deleted' || state === 'detached'
}

function entryKey(aggregate: AggregateRoot): string {
    return `${aggregate.aggregateType}:${aggregate.id}`
}

/**
 * 1 つの作業単位（UnitOfWork）の中で変更された集約を追跡する
 *
 * 【状態の遷移】
 * - added → modified: added のまま（まだ保存されていないため）
 * - added → deleted: detached（何も書き込まないが、イベントの収集対象には残す）
 * - detached → deleted: detached のまま
 * - それ以外: 後から来た状態で上書き
 *
 * 追跡の順番は最初に追跡した順のまま。
 */
export class ChangeTracker {
    private readonly entriesByKey = new Map<string, TrackedEntry>()

    track(aggregate: AggregateRoot, state: EntryState): void {
        const key = entryKey(aggregate)
        const current = this.entriesByKey.get(key)

        if (current?.state === 'added' && state === 'modified') {
            this.entriesByKey.set(key, {aggregate, state: 'added'})
            return
        }

        if ((current?.state === 'added' || current?.state === 'detached') && state === 'deleted') {
            this.entriesByKey.set(key, {aggregate, state: 'detached'})
            return
        }

        this.entriesByKey.set(key, {aggregate, state})
    }

    entries(): readonly TrackedEntry[] {
        return [...this.entriesByKey.values()]
    }

    /**
     * 書き込みが必要な追跡だけを返す
     */
    changes(): readonly TrackedEntry[] {
        return this.entries().filter((entry) => entry.state !== 'detached')
    }

    /**
     * イベントを収集する対象（detached も含む）
     */
    aggregates(): readonly AggregateRoot[] {
        return this.entries().map((entry) => entry.aggregate)
    }

    find(aggregateType: string, id: string): TrackedEntry | undefined {
        return this.entriesByKey.get(`${aggregateType}:${id}`)
    }

    hasChanges(): boolean {
        return this.changes().length > 0
    }

    /**
     * コミットが成功した後に呼ぶ。追跡中の変更を全て捨てる。
     */
    acceptChanges(): void {
        this.entriesByKey.clear()
    }
}
