import {inject, injectable} from 'tsyringe'
import type {Logger} from '../logging/Logger'
import {LoggerToken} from '../logging/Logger'
import type {CacheServicePort} from './port/CacheServicePort'
import {CacheServicePortToken} from './port/CacheServicePort'

/**
 * 古くなったクエリ結果のキャッシュを削除する
 *
 * 【ベストエフォート】
 * 削除に失敗しても例外は投げない（警告ログだけ）。
 * 古いキャッシュは有効期限が切れるまで残る。
 */
@injectable()
export class CacheInvalidator {
    private readonly logger: Logger

    constructor(
        @inject(CacheServicePortToken)
        private readonly cache: CacheServicePort,
        @inject(LoggerToken)
        logger: Logger
    ) {
        this.logger = logger.child({component: 'CacheInvalidator'})
    }

    async invalidate(keys: readonly string[]): Promise<void> {
        if (keys.length === 0) {
            return
        }

        try {
            await this.cache.remove(keys)
            this.logger.debug({keys}, '🗑️  Cache invalidated')
        } catch (error) {
            this.logger.warn({err: error, keys}, '⚠️  Failed to invalidate cache (stale entries remain until TTL)')
        }
    }
}
