import {inject, injectable} from 'tsyringe';
import type {WriteStorePort} from '../../../../common/persistence/port/WriteStorePort';
import {WriteStorePortToken} from '../../../../common/persistence/port/WriteStorePort';
import {isRemovedState} from '../../../../common/persistence/ChangeTracker';
import {CUSTOMER_AGGREGATE_TYPE} from '../../../application/domain/event/CustomerEvents';
import {Customer} from '../../../application/domain/model/Customer';
import type {CustomerRepository} from '../../../application/port/out/CustomerRepository';
import {CustomerPersister, CUSTOMERS_TABLE} from './CustomerPersister';

/**
 * 書き込みストアを使った顧客リポジトリ
 *
 * 【追跡と読み取り】
 * - add / update / remove: 書き込みストアの ChangeTracker に登録するだけ
 * - findById / findByEmail: 追跡中の集約を優先し、無ければコミット済みの行から復元する
 *
 * 同じ集約を 2 回読んでも同じインスタンスが返るので、
 * 1 つの作業単位で積んだイベントが失われない。
 */
@injectable()
export class WriteStoreCustomerRepository implements CustomerRepository {
  private readonly persister = new CustomerPersister();

  constructor(
    @inject(WriteStorePortToken)
    private readonly writeStore: WriteStorePort
  ) {}

  add(customer: Customer): void {
    this.writeStore.changeTracker.track(customer, 'added');
  }

  update(customer: Customer): void {
    this.writeStore.changeTracker.track(customer, 'modified');
  }

  remove(customer: Customer): void {
    this.writeStore.changeTracker.track(customer, 'deleted');
  }

  async findById(customerId: string): Promise<Customer | undefined> {
    const tracked = this.writeStore.changeTracker.find(CUSTOMER_AGGREGATE_TYPE, customerId);
    if (tracked) {
      return isRemovedState(tracked.state) || !(tracked.aggregate instanceof Customer)
        ? undefined
        : tracked.aggregate;
    }

    const row = await this.writeStore.findRow(CUSTOMERS_TABLE, customerId);
    return row ? this.persister.fromRow(row) : undefined;
  }

  async findByEmail(email: string): Promise<Customer | undefined> {
    const normalized = email.trim().toLowerCase();

    const tracked = this.trackedCustomers().find((customer) => customer.getEmail() === normalized);
    if (tracked) {
      return tracked;
    }

    const rows = await this.writeStore.findRowsBy(CUSTOMERS_TABLE, 'email', normalized);
    const customers = rows.map((row) => this.persister.fromRow(row));

    // コミット済みでも、この作業単位で削除・変更されたものは除く
    return customers.find(
      (customer) => this.writeStore.changeTracker.find(CUSTOMER_AGGREGATE_TYPE, customer.id) === undefined
    );
  }

  private trackedCustomers(): Customer[] {
    return this.writeStore.changeTracker
      .entries()
      .filter((entry) => !isRemovedState(entry.state))
      .map((entry) => entry.aggregate)
      .filter((aggregate): aggregate is Customer => aggregate instanceof Customer);
  }
}
