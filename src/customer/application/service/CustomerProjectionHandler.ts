import {inject, injectable} from 'tsyringe';
import {CacheInvalidator} from '../../../common/cache/CacheInvalidator';
import type {Logger} from '../../../common/logging/Logger';
import {LoggerToken} from '../../../common/logging/Logger';
import type {CustomerCreatedEvent, CustomerDeletedEvent, CustomerUpdatedEvent} from '../domain/event/CustomerEvents';
import {toCustomerQueryModel} from '../domain/model/CustomerQueryModel';
import type {CustomerReadStorePort} from '../port/out/CustomerReadStorePort';
import {CustomerReadStorePortToken} from '../port/out/CustomerReadStorePort';
import {staleKeysFor} from './CustomerCacheKeys';

/**
 * 顧客イベントを読み取りストアに投影するハンドラー
 *
 * 【各ハンドラーの処理】
 * 1. 読み取りストアを更新する（upsert / id で削除）
 * 2. 古くなったキャッシュキーを削除する（ベストエフォート）
 *
 * 読み取りストアの更新に失敗した場合は例外をそのまま投げる。
 * ディスパッチャーがまとめて EventDispatchException にする。
 */
@injectable()
export class CustomerProjectionHandler {
  private readonly logger: Logger;

  constructor(
    @inject(CustomerReadStorePortToken)
    private readonly readStore: CustomerReadStorePort,
    @inject(CacheInvalidator)
    private readonly cacheInvalidator: CacheInvalidator,
    @inject(LoggerToken)
    logger: Logger
  ) {
    this.logger = logger.child({component: 'CustomerProjectionHandler'});
  }

  async onCreated(event: CustomerCreatedEvent): Promise<void> {
    this.logTriggered(event);
    await this.readStore.upsert(toCustomerQueryModel(event));
    await this.cacheInvalidator.invalidate(staleKeysFor(event.id));
  }

  async onUpdated(event: CustomerUpdatedEvent): Promise<void> {
    this.logTriggered(event);
    await this.readStore.upsert(toCustomerQueryModel(event));
    await this.cacheInvalidator.invalidate(staleKeysFor(event.id));
  }

  async onDeleted(event: CustomerDeletedEvent): Promise<void> {
    this.logTriggered(event);
    await this.readStore.deleteById(event.id);
    await this.cacheInvalidator.invalidate(staleKeysFor(event.id));
  }

  private logTriggered(event: CustomerCreatedEvent | CustomerUpdatedEvent | CustomerDeletedEvent): void {
    this.logger.info(
      {eventType: event.eventType, eventId: event.eventId, customerId: event.id},
      '📥 Projecting customer event'
    );
  }
}
