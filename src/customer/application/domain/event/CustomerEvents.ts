import {randomUUID} from 'node:crypto';
import type {DomainEvent} from '../../../../common/event/DomainEvent';

export const CUSTOMER_AGGREGATE_TYPE = 'Customer';

export type Gender = 'Male' | 'Female';

/**
 * 顧客イベントの共通部分
 */
abstract class CustomerBaseEvent implements DomainEvent {
  readonly eventId: string = randomUUID();
  readonly occurredOn: Date = new Date();
  readonly aggregateType = CUSTOMER_AGGREGATE_TYPE;
  readonly aggregateId: string;

  abstract readonly eventType: string;
  abstract readonly eventKind: DomainEvent['eventKind'];

  protected constructor(public readonly id: string) {
    this.aggregateId = id;
  }
}

/**
 * 顧客が作成された
 *
 * 【誰が購読するか】
 * - CustomerProjectionHandler: 読み取りストアに顧客を追加する
 */
export class CustomerCreatedEvent extends CustomerBaseEvent {
  readonly eventType = 'CustomerCreatedEvent';
  readonly eventKind = 'created';

  constructor(
    id: string,
    public readonly firstName: string,
    public readonly lastName: string,
    public readonly gender: Gender,
    public readonly email: string,
    /** YYYY-MM-DD */
    public readonly dateOfBirth: string
  ) {
    super(id);
  }
}

/**
 * 顧客の情報が更新された
 *
 * 投影に必要な全ての項目を持つ（差分ではない）。
 */
export class CustomerUpdatedEvent extends CustomerBaseEvent {
  readonly eventType = 'CustomerUpdatedEvent';
  readonly eventKind = 'updated';

  constructor(
    id: string,
    public readonly firstName: string,
    public readonly lastName: string,
    public readonly gender: Gender,
    public readonly email: string,
    public readonly dateOfBirth: string
  ) {
    super(id);
  }
}

/**
 * 顧客が削除された
 */
export class CustomerDeletedEvent extends CustomerBaseEvent {
  readonly eventType = 'CustomerDeletedEvent';
  readonly eventKind = 'deleted';

  constructor(
    id: string,
    public readonly email: string
  ) {
    super(id);
  }
}

/**
 * 顧客イベントのタグ付きユニオン（eventKind で判別する）
 */
export type CustomerEvent = CustomerCreatedEvent | CustomerUpdatedEvent | CustomerDeletedEvent;
