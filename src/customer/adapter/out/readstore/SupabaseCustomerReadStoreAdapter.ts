import type {SupabaseClient} from '@supabase/supabase-js';
import {inject, injectable} from 'tsyringe';
import {z} from 'zod';
import {SupabaseClientToken} from '../../../../config/types';
import type {CustomerQueryModel} from '../../../application/domain/model/CustomerQueryModel';
import type {CustomerReadStorePort} from '../../../application/port/out/CustomerReadStorePort';

export const CUSTOMERS_READ_TABLE = 'customers_read';

/**
 * customers_read テーブルの 1 行
 */
const CustomerReadRowSchema = z.object({
  id: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  full_name: z.string(),
  gender: z.enum(['Male', 'Female']),
  email: z.string(),
  date_of_birth: z.string(),
});

type CustomerReadRow = z.infer<typeof CustomerReadRowSchema>;

function toRow(customer: CustomerQueryModel): CustomerReadRow {
  return {
    id: customer.id,
    first_name: customer.firstName,
    last_name: customer.lastName,
    full_name: customer.fullName,
    gender: customer.gender,
    email: customer.email,
    date_of_birth: customer.dateOfBirth,
  };
}

function fromRow(row: CustomerReadRow): CustomerQueryModel {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    fullName: row.full_name,
    gender: row.gender,
    email: row.email,
    dateOfBirth: row.date_of_birth,
  };
}

/**
 * Supabaseを使った読み取りストアの実装
 *
 * 【実装のポイント】
 * 1. upsert は onConflict: 'id' で冪等にする
 *    - 同じイベントを 2 回投影しても 1 行のまま
 *
 * 2. 削除は id で行う
 *    - メールアドレスは変更されうるので、削除のキーには使わない
 *
 * 3. 取得した行は zod で検証してから読み取りモデルに変換する
 */
@injectable()
export class SupabaseCustomerReadStoreAdapter implements CustomerReadStorePort {
  constructor(
    @inject(SupabaseClientToken)
    private readonly supabaseClient: SupabaseClient
  ) {}

  async upsert(customer: CustomerQueryModel): Promise<void> {
    const {error} = await this.supabaseClient
      .from(CUSTOMERS_READ_TABLE)
      .upsert(toRow(customer), {onConflict: 'id'});

    if (error) {
      throw new Error(`Failed to upsert customer ${customer.id}: ${error.message}`);
    }
  }

  async deleteById(customerId: string): Promise<void> {
    const {error} = await this.supabaseClient
      .from(CUSTOMERS_READ_TABLE)
      .delete()
      .eq('id', customerId);

    if (error) {
      throw new Error(`Failed to delete customer ${customerId}: ${error.message}`);
    }
  }

  async findById(customerId: string): Promise<CustomerQueryModel | undefined> {
    const {data, error} = await this.supabaseClient
      .from(CUSTOMERS_READ_TABLE)
      .select('*')
      .eq('id', customerId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to find customer ${customerId}: ${error.message}`);
    }

    return data === null ? undefined : fromRow(CustomerReadRowSchema.parse(data));
  }

  async findAll(): Promise<CustomerQueryModel[]> {
    const {data, error} = await this.supabaseClient
      .from(CUSTOMERS_READ_TABLE)
      .select('*')
      .order('last_name', {ascending: true});

    if (error) {
      throw new Error(`Failed to list customers: ${error.message}`);
    }

    return z.array(CustomerReadRowSchema).parse(data).map(fromRow);
  }
}
