import {z} from 'zod';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'dateOfBirth must be formatted as YYYY-MM-DD');

/**
 * 顧客作成リクエスト（JSONボディ）
 *
 * Web層では形式だけを検証する。業務ルールは Customer が検証する。
 */
export const CreateCustomerWebRequestSchema = z.object({
  firstName: z.string().min(1, 'firstName is required'),
  lastName: z.string().min(1, 'lastName is required'),
  gender: z.enum(['Male', 'Female']),
  email: z.string().email('email must be a valid e-mail address'),
  dateOfBirth: isoDate,
});

export type CreateCustomerWebRequest = z.infer<typeof CreateCustomerWebRequestSchema>;

/**
 * メールアドレス変更リクエスト
 */
export const UpdateCustomerWebRequestSchema = z.object({
  email: z.string().email('email must be a valid e-mail address'),
});

export type UpdateCustomerWebRequest = z.infer<typeof UpdateCustomerWebRequestSchema>;

/**
 * パスパラメータ
 */
export const CustomerIdParamSchema = z.object({
  id: z.string().min(1),
});
