import {injectable} from 'tsyringe';
import type {CustomerQueryModel} from '../../../application/domain/model/CustomerQueryModel';
import type {CustomerReadStorePort} from '../../../application/port/out/CustomerReadStorePort';

/**
 * インメモリ実装の読み取りストア
 *
 * 【用途】
 * - 開発環境でのクイックテスト
 * - 単体テスト・統合テスト
 *
 * 出し入れのたびにコピーするので、呼び出し側が返り値を書き換えても中身は変わらない。
 */
@injectable()
export class InMemoryCustomerReadStoreAdapter implements CustomerReadStorePort {
  private readonly customers = new Map<string, CustomerQueryModel>();

  upsert(customer: CustomerQueryModel): Promise<void> {
    this.customers.set(customer.id, {...customer});
    return Promise.resolve();
  }

  deleteById(customerId: string): Promise<void> {
    this.customers.delete(customerId);
    return Promise.resolve();
  }

  findById(customerId: string): Promise<CustomerQueryModel | undefined> {
    const customer = this.customers.get(customerId);
    return Promise.resolve(customer ? {...customer} : undefined);
  }

  findAll(): Promise<CustomerQueryModel[]> {
    return Promise.resolve([...this.customers.values()].map((customer) => ({...customer})));
  }

  /**
   * 件数（テスト用）
   */
  size(): number {
    return this.customers.size;
  }
}
