import type {CustomerQueryModel} from '../../domain/model/CustomerQueryModel';

/**
 * 読み取りストア（非正規化された投影）のポート
 *
 * 投影ハンドラーが書き込み、クエリサービスが読む。
 */
export interface CustomerReadStorePort {
  /**
   * ID をキーに挿入または置換する（同じ内容で何度呼んでも結果は同じ）
   */
  upsert(customer: CustomerQueryModel): Promise<void>;

  /**
   * 存在しなければ何もしない
   */
  deleteById(customerId: string): Promise<void>;

  findById(customerId: string): Promise<CustomerQueryModel | undefined>;

  findAll(): Promise<CustomerQueryModel[]>;
}

export const CustomerReadStorePortToken = Symbol('CustomerReadStorePort');
