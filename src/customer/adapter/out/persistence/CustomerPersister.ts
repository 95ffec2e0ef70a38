import {z} from 'zod';
import type {AggregatePersister, WriteRow} from '../../../../common/persistence/AggregatePersister';
import {CUSTOMER_AGGREGATE_TYPE} from '../../../application/domain/event/CustomerEvents';
import {Customer} from '../../../application/domain/model/Customer';

export const CUSTOMERS_TABLE = 'customers';

/**
 * customers テーブルの 1 行
 *
 * date_of_birth は 'YYYY-MM-DD' のテキスト列（db/schema.sql）
 */
const CustomerRowSchema = z.object({
  id: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  gender: z.enum(['Male', 'Female']),
  email: z.string(),
  date_of_birth: z.string(),
});

/**
 * Customer 集約と customers テーブルの行を相互に変換する
 */
export class CustomerPersister implements AggregatePersister<Customer> {
  readonly aggregateType = CUSTOMER_AGGREGATE_TYPE;
  readonly tableName = CUSTOMERS_TABLE;
  readonly uniqueColumns = ['email'];

  toRow(customer: Customer): WriteRow {
    return {
      id: customer.id,
      first_name: customer.getFirstName(),
      last_name: customer.getLastName(),
      gender: customer.getGender(),
      email: customer.getEmail(),
      date_of_birth: customer.getDateOfBirth().toISOString().slice(0, 10),
    };
  }

  fromRow(row: WriteRow): Customer {
    const parsed = CustomerRowSchema.parse(row);
    return Customer.reconstitute(parsed.id, {
      firstName: parsed.first_name,
      lastName: parsed.last_name,
      gender: parsed.gender,
      email: parsed.email,
      dateOfBirth: new Date(parsed.date_of_birth),
    });
  }
}
