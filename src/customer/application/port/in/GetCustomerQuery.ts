import type {CustomerQueryModel} from '../../domain/model/CustomerQueryModel';

/**
 * 顧客の読み取り系ユースケース（入力ポート）
 *
 * 読み取りストアだけを見る。書き込みストアには触れない。
 */
export interface GetCustomerQuery {
  getAllCustomers(): Promise<CustomerQueryModel[]>;

  /**
   * @throws CustomerNotFoundException
   */
  getCustomerById(customerId: string): Promise<CustomerQueryModel>;
}

export const GetCustomerQueryToken = Symbol('GetCustomerQuery');
