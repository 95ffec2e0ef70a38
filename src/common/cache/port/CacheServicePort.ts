/**
 * キャッシュのポート（インターフェース）
 *
 * キーはクエリのシグネチャ（例: 'GetAllCustomerQuery', 'GetCustomerByIdQuery_7'）。
 */
export interface CacheServicePort {
    /**
     * キャッシュされた値を取得する。無ければ null
     */
    get<T>(key: string, parse: (value: unknown) => T): Promise<T | null>

    /**
     * 値を保存する
     *
     * @param ttlSeconds 有効期限（秒）
     */
    set(key: string, value: unknown, ttlSeconds: number): Promise<void>

    /**
     * 指定されたキーを全て削除する。存在しないキーは無視される
     */
    remove(keys: readonly string[]): Promise<void>

    dispose(): Promise<void>
}

export const CacheServicePortToken = Symbol('CacheServicePort')
