import {injectable} from 'tsyringe'
import type {WriteRow} from '../AggregatePersister'

/**
 * コミット時に反映する書き込み
 */
export type PendingWrite =
    | {kind: 'upsert'; table: string; id: string; row: WriteRow}
    | {kind: 'delete'; table: string; id: string}

type Tables = Map<string, Map<string, WriteRow>>

function applyTo(tables: Tables, writes: readonly PendingWrite[]): void {
    writes.forEach((write) => {
        const rows = tables.get(write.table) ?? new Map<string, WriteRow>()
        if (write.kind === 'delete') {
            rows.delete(write.id)
        } else {
            rows.set(write.id, {...write.row})
        }
        tables.set(write.table, rows)
    })
}

/**
 * インメモリの「データベース」本体
 *
 * アプリケーション全体で 1 つだけ作り、リクエストごとの
 * InMemoryWriteStoreAdapter から共有する。
 */
@injectable()
export class InMemoryWriteDatabase {
    private readonly tables: Tables = new Map()

    apply(writes: readonly PendingWrite[]): void {
        applyTo(this.tables, writes)
    }

    /**
     * コミット済みの行に書き込みを重ねた結果（自身は変更しない）
     */
    preview(writes: readonly PendingWrite[]): ReadonlyMap<string, ReadonlyMap<string, WriteRow>> {
        const projected: Tables = new Map()
        this.tables.forEach((rows, table) => {
            projected.set(table, new Map(rows))
        })
        applyTo(projected, writes)
        return projected
    }

    find(table: string, id: string): WriteRow | undefined {
        const row = this.tables.get(table)?.get(id)
        return row ? {...row} : undefined
    }

    findBy(table: string, column: string, value: WriteRow[string]): WriteRow[] {
        return [...(this.tables.get(table)?.values() ?? [])]
            .filter((row) => row[column] === value)
            .map((row) => ({...row}))
    }

    count(table: string): number {
        return this.tables.get(table)?.size ?? 0
    }
}
