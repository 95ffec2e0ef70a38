import type {Customer} from '../../domain/model/Customer';

/**
 * 顧客集約のリポジトリ（出力ポート）
 *
 * add / update / remove は変更を追跡するだけで、書き込みは UnitOfWork.commit() が行う。
 */
export interface CustomerRepository {
  add(customer: Customer): void;
  update(customer: Customer): void;
  remove(customer: Customer): void;

  /**
   * 同じ作業単位で追跡中の集約があればそれを返す
   */
  findById(customerId: string): Promise<Customer | undefined>;

  findByEmail(email: string): Promise<Customer | undefined>;
}

export const CustomerRepositoryToken = Symbol('CustomerRepository');
