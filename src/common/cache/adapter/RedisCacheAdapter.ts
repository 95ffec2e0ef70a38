import type {Redis} from 'ioredis'
import {inject, injectable} from 'tsyringe'
import {RedisClientToken} from '../../../config/types'
import type {CacheServicePort} from '../port/CacheServicePort'

/**
 * Redis（ioredis）を使ったキャッシュの実装
 *
 * 値は JSON 文字列で保存し、有効期限は EX で指定する。
 */
@injectable()
export class RedisCacheAdapter implements CacheServicePort {
    constructor(
        @inject(RedisClientToken)
        private readonly redis: Redis
    ) {}

    async get<T>(key: string, parse: (value: unknown) => T): Promise<T | null> {
        const raw = await this.redis.get(key)
        if (raw === null) {
            return null
        }
        return parse(JSON.parse(raw))
    }

    async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
        await this.redis.set(key, JSON.stringify(value), 'EX', ttlSeconds)
    }

    async remove(keys: readonly string[]): Promise<void> {
        if (keys.length === 0) {
            return
        }
        await this.redis.del(...keys)
    }

    async dispose(): Promise<void> {
        await this.redis.quit()
    }
}
