import type {AggregateRoot} from '../domain/AggregateRoot'

/**
 * 書き込みストアの 1 行（列名 → 値）
 */
export type WriteRow = Record<string, string | number | boolean | null>

/**
 * 集約と書き込みストアの行を相互に変換する
 *
 * 書き込みストアのアダプターは集約の種類ごとにこれを登録して使う。
 * アダプター自身は集約の中身を知らない。
 */
export interface AggregatePersister<T extends AggregateRoot> {
    readonly aggregateType: string
    readonly tableName: string
    /** 一意でなければならない列（主キー以外） */
    readonly uniqueColumns: readonly string[]

    toRow(aggregate: T): WriteRow
    fromRow(row: WriteRow): T
}

export const AggregatePersistersToken = Symbol('AggregatePersisters')

/**
 * 集約の種類から Persister を引く
 */
export class PersisterRegistry {
    private readonly persisters = new Map<string, AggregatePersister<AggregateRoot>>()

    constructor(persisters: readonly AggregatePersister<AggregateRoot>[]) {
        persisters.forEach((persister) => {
            this.persisters.set(persister.aggregateType, persister)
        })
    }

    get(aggregateType: string): AggregatePersister<AggregateRoot> {
        const persister = this.persisters.get(aggregateType)
        if (!persister) {
            throw new Error(`No persister registered for aggregate type: ${aggregateType}`)
        }
        return persister
    }

    findByTable(tableName: string): AggregatePersister<AggregateRoot> | undefined {
        return [...this.persisters.values()].find((persister) => persister.tableName === tableName)
    }
}
