import type {CreateCustomerCommand, DeleteCustomerCommand, UpdateCustomerCommand} from './CustomerCommands';

/**
 * 顧客の書き込み系ユースケース（入力ポート）
 *
 * どの操作も 1 回の UnitOfWork.commit() で終わる。
 * コミットが成功すれば、読み取りストアとキャッシュも更新済みになっている。
 */
export interface ManageCustomerUseCase {
  /**
   * @returns 採番された顧客ID
   * @throws DuplicateEmailException
   */
  createCustomer(command: CreateCustomerCommand): Promise<string>;

  /**
   * @throws CustomerNotFoundException
   * @throws DuplicateEmailException
   */
  updateCustomer(command: UpdateCustomerCommand): Promise<void>;

  /**
   * @throws CustomerNotFoundException
   */
  deleteCustomer(command: DeleteCustomerCommand): Promise<void>;
}

export const ManageCustomerUseCaseToken = Symbol('ManageCustomerUseCase');
