import type {CacheServicePort} from '../port/CacheServicePort'

interface CacheEntry {
    value: string
    expiresAt: number
}

/**
 * インメモリ実装のキャッシュ
 *
 * 値は JSON 文字列で保持するので、取り出した値を書き換えても
 * キャッシュの中身には影響しない。
 *
 * 時計を差し替えられるよう、コンテナには useValue で登録する。
 */
export class InMemoryCacheAdapter implements CacheServicePort {
    private readonly entries = new Map<string, CacheEntry>()

    constructor(private readonly now: () => number = Date.now) {}

    get<T>(key: string, parse: (value: unknown) => T): Promise<T | null> {
        const entry = this.entries.get(key)
        if (!entry) {
            return Promise.resolve(null)
        }
        if (entry.expiresAt <= this.now()) {
            this.entries.delete(key)
            return Promise.resolve(null)
        }
        return Promise.resolve(parse(JSON.parse(entry.value)))
    }

    set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
        this.entries.set(key, {
            value: JSON.stringify(value),
            expiresAt: this.now() + ttlSeconds * 1000,
        })
        return Promise.resolve()
    }

    remove(keys: readonly string[]): Promise<void> {
        keys.forEach((key) => this.entries.delete(key))
        return Promise.resolve()
    }

    dispose(): Promise<void> {
        this.entries.clear()
        return Promise.resolve()
    }

    /**
     * キーが存在するか（テスト用、期限切れは考慮しない）
     */
    has(key: string): boolean {
        return this.entries.has(key)
    }
}
