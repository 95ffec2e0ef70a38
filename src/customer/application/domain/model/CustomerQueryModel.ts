import {z} from 'zod';
import type {CustomerCreatedEvent, CustomerUpdatedEvent} from '../event/CustomerEvents';

/**
 * 読み取りストアの顧客（非正規化された投影）
 *
 * 書き込み側の Customer とは別物。一覧・詳細表示に必要な形をそのまま持つ。
 */
export const CustomerQueryModelSchema = z.object({
  id: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  fullName: z.string(),
  gender: z.enum(['Male', 'Female']),
  email: z.string(),
  dateOfBirth: z.string(),
});

export type CustomerQueryModel = z.infer<typeof CustomerQueryModelSchema>;

/**
 * 作成・更新イベントから読み取りモデルを作る
 */
export function toCustomerQueryModel(event: CustomerCreatedEvent | CustomerUpdatedEvent): CustomerQueryModel {
  return {
    id: event.id,
    firstName: event.firstName,
    lastName: event.lastName,
    fullName: `${event.firstName} ${event.lastName}`,
    gender: event.gender,
    email: event.email,
    dateOfBirth: event.dateOfBirth,
  };
}
