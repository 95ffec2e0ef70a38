import {inject, injectable} from 'tsyringe';
import type {Logger} from '../../../common/logging/Logger';
import {LoggerToken} from '../../../common/logging/Logger';
import type {UnitOfWork} from '../../../common/persistence/port/UnitOfWork';
import {UnitOfWorkToken} from '../../../common/persistence/port/UnitOfWork';
import {CustomerNotFoundException, DuplicateEmailException} from '../domain/exception/CustomerExceptions';
import {Customer} from '../domain/model/Customer';
import type {CreateCustomerCommand, DeleteCustomerCommand, UpdateCustomerCommand} from '../port/in/CustomerCommands';
import type {ManageCustomerUseCase} from '../port/in/ManageCustomerUseCase';
import type {CustomerRepository} from '../port/out/CustomerRepository';
import {CustomerRepositoryToken} from '../port/out/CustomerRepository';

/**
 * 顧客アプリケーションサービス
 *
 * 役割: ユースケースの調整・オーケストレーション
 * - 受信ポート（ManageCustomerUseCase）を実装
 * - リポジトリから集約を取得し、業務操作を呼ぶ
 * - 最後に UnitOfWork.commit() を 1 回だけ呼ぶ
 *
 * 【責務の明確化】
 * - 入力値の検証 → Customer に委譲
 * - メールアドレスの重複確認 → このサービス
 * - 書き込み・イベントの保存と配信 → UnitOfWork
 *
 * 読み取りストアやキャッシュには直接触れない。それらはコミット後に
 * 配信されたイベントを受けた投影ハンドラーが更新する。
 */
@injectable()
export class CustomerApplicationService implements ManageCustomerUseCase {
  private readonly logger: Logger;

  constructor(
    @inject(CustomerRepositoryToken)
    private readonly customerRepository: CustomerRepository,
    @inject(UnitOfWorkToken)
    private readonly unitOfWork: UnitOfWork,
    @inject(LoggerToken)
    logger: Logger
  ) {
    this.logger = logger.child({component: 'CustomerApplicationService'});
  }

  async createCustomer(command: CreateCustomerCommand): Promise<string> {
    const customer = Customer.create({
      firstName: command.firstName,
      lastName: command.lastName,
      gender: command.gender,
      email: command.email,
      dateOfBirth: command.dateOfBirth,
    });

    await this.ensureEmailAvailable(customer.getEmail(), customer.id);

    this.customerRepository.add(customer);
    await this.unitOfWork.commit();

    this.logger.info({customerId: customer.id}, 'Customer created');
    return customer.id;
  }

  async updateCustomer(command: UpdateCustomerCommand): Promise<void> {
    const customer = await this.loadCustomer(command.customerId);

    await this.ensureEmailAvailable(command.email, customer.id);

    customer.changeEmail(command.email);

    // 変更が無ければイベントも書き込みも無い
    if (customer.domainEvents.length === 0) {
      return;
    }

    this.customerRepository.update(customer);
    await this.unitOfWork.commit();

    this.logger.info({customerId: customer.id}, 'Customer e-mail changed');
  }

  async deleteCustomer(command: DeleteCustomerCommand): Promise<void> {
    const customer = await this.loadCustomer(command.customerId);

    customer.delete();

    this.customerRepository.remove(customer);
    await this.unitOfWork.commit();

    this.logger.info({customerId: customer.id}, 'Customer deleted');
  }

  private async loadCustomer(customerId: string): Promise<Customer> {
    const customer = await this.customerRepository.findById(customerId);
    if (!customer) {
      throw new CustomerNotFoundException(customerId);
    }
    return customer;
  }

  private async ensureEmailAvailable(email: string, ownerId: string): Promise<void> {
    const existing = await this.customerRepository.findByEmail(email);
    if (existing && existing.id !== ownerId) {
      throw new DuplicateEmailException(email.trim().toLowerCase());
    }
  }
}
