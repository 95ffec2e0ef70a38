import {randomUUID} from 'node:crypto';
import {AggregateRoot} from '../../../../common/domain/AggregateRoot';
import {
  CUSTOMER_AGGREGATE_TYPE,
  CustomerCreatedEvent,
  CustomerDeletedEvent,
  CustomerUpdatedEvent,
} from '../event/CustomerEvents';
import type {Gender} from '../event/CustomerEvents';
import {InvalidCustomerException} from '../exception/CustomerExceptions';

export type {Gender};

/**
 * 顧客を作るときの入力
 */
export interface CustomerProps {
  firstName: string;
  lastName: string;
  gender: Gender;
  email: string;
  dateOfBirth: Date;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const MAX_NAME_LENGTH = 100;

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function requireName(field: string, value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new InvalidCustomerException(field, `${field} must not be empty`);
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw new InvalidCustomerException(field, `${field} must be at most ${String(MAX_NAME_LENGTH)} characters`);
  }
  return trimmed;
}

function requireEmail(value: string): string {
  const normalized = value.trim().toLowerCase();
  if (!EMAIL_PATTERN.test(normalized)) {
    throw new InvalidCustomerException('email', `Invalid e-mail address: ${value}`);
  }
  return normalized;
}

function requireDateOfBirth(value: Date): Date {
  if (Number.isNaN(value.getTime())) {
    throw new InvalidCustomerException('dateOfBirth', 'dateOfBirth must be a valid date');
  }
  if (value.getTime() >= Date.now()) {
    throw new InvalidCustomerException('dateOfBirth', 'dateOfBirth must be in the past');
  }
  return value;
}

/**
 * 顧客（集約ルート）
 *
 * 【発行するイベント】
 * - create()      → CustomerCreatedEvent
 * - changeEmail() → CustomerUpdatedEvent
 * - delete()      → CustomerDeletedEvent
 *
 * イベントはキューに積まれるだけで、発行は UnitOfWork.commit() が行う。
 */
export class Customer extends AggregateRoot {
  readonly aggregateType = CUSTOMER_AGGREGATE_TYPE;

  private constructor(
    id: string,
    private readonly firstName: string,
    private readonly lastName: string,
    private readonly gender: Gender,
    private email: string,
    private readonly dateOfBirth: Date,
    private deleted: boolean
  ) {
    super(id);
  }

  /**
   * 新しい顧客を作る
   *
   * @param id 省略時は UUID を採番する
   * @throws InvalidCustomerException 入力値が不正な場合
   */
  static create(props: CustomerProps, id: string = randomUUID()): Customer {
    const customer = new Customer(
      id,
      requireName('firstName', props.firstName),
      requireName('lastName', props.lastName),
      props.gender,
      requireEmail(props.email),
      requireDateOfBirth(props.dateOfBirth),
      false
    );

    customer.addDomainEvent(
      new CustomerCreatedEvent(
        customer.id,
        customer.firstName,
        customer.lastName,
        customer.gender,
        customer.email,
        toIsoDate(customer.dateOfBirth)
      )
    );

    return customer;
  }

  /**
   * 保存済みの状態から復元する（イベントは発行しない）
   */
  static reconstitute(id: string, props: CustomerProps): Customer {
    return new Customer(
      id,
      props.firstName,
      props.lastName,
      props.gender,
      props.email,
      props.dateOfBirth,
      false
    );
  }

  getFirstName(): string {
    return this.firstName;
  }

  getLastName(): string {
    return this.lastName;
  }

  getGender(): Gender {
    return this.gender;
  }

  getEmail(): string {
    return this.email;
  }

  getDateOfBirth(): Date {
    return this.dateOfBirth;
  }

  isDeleted(): boolean {
    return this.deleted;
  }

  /**
   * メールアドレスを変更する
   *
   * 同じアドレス（正規化後）ならイベントは発行しない。
   *
   * @throws InvalidCustomerException 形式が不正な場合、または削除済みの場合
   */
  changeEmail(email: string): void {
    this.ensureNotDeleted();

    const normalized = requireEmail(email);
    if (normalized === this.email) {
      return;
    }

    this.email = normalized;

    this.addDomainEvent(
      new CustomerUpdatedEvent(
        this.id,
        this.firstName,
        this.lastName,
        this.gender,
        this.email,
        toIsoDate(this.dateOfBirth)
      )
    );
  }

  /**
   * 顧客を削除する
   *
   * @throws InvalidCustomerException 既に削除済みの場合
   */
  delete(): void {
    this.ensureNotDeleted();
    this.deleted = true;
    this.addDomainEvent(new CustomerDeletedEvent(this.id, this.email));
  }

  private ensureNotDeleted(): void {
    if (this.deleted) {
      throw new InvalidCustomerException('id', `Customer ${this.id} has been deleted`);
    }
  }
}
