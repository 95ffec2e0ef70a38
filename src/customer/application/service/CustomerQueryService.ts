import {inject, injectable} from 'tsyringe';
import {z} from 'zod';
import type {CacheServicePort} from '../../../common/cache/port/CacheServicePort';
import {CacheServicePortToken} from '../../../common/cache/port/CacheServicePort';
import type {Logger} from '../../../common/logging/Logger';
import {LoggerToken} from '../../../common/logging/Logger';
import type {AppConfig} from '../../../config/env';
import {AppConfigToken} from '../../../config/types';
import {CustomerNotFoundException} from '../domain/exception/CustomerExceptions';
import type {CustomerQueryModel} from '../domain/model/CustomerQueryModel';
import {CustomerQueryModelSchema} from '../domain/model/CustomerQueryModel';
import type {GetCustomerQuery} from '../port/in/GetCustomerQuery';
import type {CustomerReadStorePort} from '../port/out/CustomerReadStorePort';
import {CustomerReadStorePortToken} from '../port/out/CustomerReadStorePort';
import {CustomerCacheKeys} from './CustomerCacheKeys';

const CustomerListSchema = z.array(CustomerQueryModelSchema);

/**
 * 顧客クエリサービス（キャッシュアサイド）
 *
 * 【読み取りの流れ】
 * 1. キャッシュにあればそれを返す
 * 2. 無ければ読み取りストアから読み、キャッシュに入れてから返す
 *
 * キャッシュの読み書きに失敗しても、読み取りストアの結果を返す。
 * キャッシュの削除は投影ハンドラーの責務。
 */
@injectable()
export class CustomerQueryService implements GetCustomerQuery {
  private readonly logger: Logger;

  constructor(
    @inject(CustomerReadStorePortToken)
    private readonly readStore: CustomerReadStorePort,
    @inject(CacheServicePortToken)
    private readonly cache: CacheServicePort,
    @inject(AppConfigToken)
    private readonly config: AppConfig,
    @inject(LoggerToken)
    logger: Logger
  ) {
    this.logger = logger.child({component: 'CustomerQueryService'});
  }

  async getAllCustomers(): Promise<CustomerQueryModel[]> {
    return this.cached(CustomerCacheKeys.all, (value) => CustomerListSchema.parse(value), () =>
      this.readStore.findAll()
    );
  }

  async getCustomerById(customerId: string): Promise<CustomerQueryModel> {
    const customer = await this.cached(
      CustomerCacheKeys.byId(customerId),
      (value) => CustomerQueryModelSchema.nullable().parse(value),
      async () => (await this.readStore.findById(customerId)) ?? null
    );

    if (customer === null) {
      throw new CustomerNotFoundException(customerId);
    }
    return customer;
  }

  private async cached<T>(key: string, parse: (value: unknown) => T, load: () => Promise<T>): Promise<T> {
    try {
      const hit = await this.cache.get(key, parse);
      if (hit !== null) {
        this.logger.debug({key}, 'Cache hit');
        return hit;
      }
    } catch (error) {
      this.logger.warn({err: error, key}, '⚠️  Failed to read cache');
    }

    const value = await load();

    // 見つからなかった結果はキャッシュしない
    if (value === null) {
      return value;
    }

    try {
      await this.cache.set(key, value, this.config.CACHE_TTL_SECONDS);
    } catch (error) {
      this.logger.warn({err: error, key}, '⚠️  Failed to write cache');
    }

    return value;
  }
}
