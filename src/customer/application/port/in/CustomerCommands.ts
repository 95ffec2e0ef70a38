import type {Gender} from '../../domain/model/Customer';

/**
 * 顧客作成コマンド
 *
 * Webアダプターで形式チェック済みの値を受け取る。
 * 業務ルール（名前が空でない、生年月日が過去など）は Customer.create() が検証する。
 */
export class CreateCustomerCommand {
  constructor(
    public readonly firstName: string,
    public readonly lastName: string,
    public readonly gender: Gender,
    public readonly email: string,
    public readonly dateOfBirth: Date
  ) {}
}

/**
 * メールアドレス変更コマンド
 */
export class UpdateCustomerCommand {
  constructor(
    public readonly customerId: string,
    public readonly email: string
  ) {}
}

export class DeleteCustomerCommand {
  constructor(public readonly customerId: string) {}
}
