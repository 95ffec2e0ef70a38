/**
 * 顧客の入力値が不正
 *
 * 【例】
 * - 名前が空
 * - メールアドレスの形式が不正
 * - 生年月日が未来
 */
export class InvalidCustomerException extends Error {
  /** 不正だった項目名（例: 'email'） */
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InvalidCustomerException';
    this.field = field;
  }
}

/**
 * 顧客が見つからない
 */
export class CustomerNotFoundException extends Error {
  public readonly customerId: string;

  constructor(customerId: string) {
    super(`Customer not found: ${customerId}`);
    this.name = 'CustomerNotFoundException';
    this.customerId = customerId;
  }
}

/**
 * メールアドレスが既に他の顧客に使われている
 *
 * 書き込みストアの一意制約でも検出されるが、アプリケーションサービスで
 * 先に確認して、この例外として返す。
 */
export class DuplicateEmailException extends Error {
  public readonly email: string;

  constructor(email: string) {
    super(`The provided e-mail address is already in use: ${email}`);
    this.name = 'DuplicateEmailException';
    this.email = email;
  }
}
