import {zValidator} from '@hono/zod-validator';
import {Hono} from 'hono';
import type {ValidationTargets} from 'hono';
import type {ZodSchema} from 'zod';
import type {AppEnv} from '../../../../types/bindings';
import type {GetCustomerQuery} from '../../../application/port/in/GetCustomerQuery';
import {GetCustomerQueryToken} from '../../../application/port/in/GetCustomerQuery';
import type {ManageCustomerUseCase} from '../../../application/port/in/ManageCustomerUseCase';
import {ManageCustomerUseCaseToken} from '../../../application/port/in/ManageCustomerUseCase';
import {
  toCreateCommand,
  toDeleteCommand,
  toErrorResponse,
  toSuccessResponse,
  toUpdateCommand,
} from './mappers/CustomerMapper';
import {
  CreateCustomerWebRequestSchema,
  CustomerIdParamSchema,
  UpdateCustomerWebRequestSchema,
} from './models/CustomerWebRequest';

/**
 * zValidator に共通の検証エラー形式を付ける
 */
const validate = <T extends ZodSchema, Target extends keyof ValidationTargets>(target: Target, schema: T) =>
  zValidator(target, schema, (result, c) => {
    if (!result.success) {
      return c.json(
        toErrorResponse('Request validation failed', 'VALIDATION_ERROR', {
          issues: result.error.issues.map((issue) => ({path: issue.path.join('.'), message: issue.message})),
        }),
        400
      );
    }
  });

/**
 * 顧客の Web アダプター
 *
 * ユースケースはリクエストごとの子コンテナから取り出す。
 * 例外は app.onError（src/index.ts）がまとめて HTTP ステータスに変換する。
 */
export const customerRouter = new Hono<AppEnv>();

customerRouter.post(
  '/customers',
  validate('json', CreateCustomerWebRequestSchema),
  async (c): Promise<Response> => {
    const request = c.req.valid('json');
    const useCase = c.var.container.resolve<ManageCustomerUseCase>(ManageCustomerUseCaseToken);

    const customerId = await useCase.createCustomer(toCreateCommand(request));

    return c.json(toSuccessResponse('Customer created successfully', {id: customerId}), 201);
  }
);

customerRouter.put(
  '/customers/:id',
  validate('param', CustomerIdParamSchema),
  validate('json', UpdateCustomerWebRequestSchema),
  async (c): Promise<Response> => {
    const {id} = c.req.valid('param');
    const request = c.req.valid('json');
    const useCase = c.var.container.resolve<ManageCustomerUseCase>(ManageCustomerUseCaseToken);

    await useCase.updateCustomer(toUpdateCommand(id, request));

    return c.json(toSuccessResponse('Customer updated successfully', {id}), 200);
  }
);

customerRouter.delete(
  '/customers/:id',
  validate('param', CustomerIdParamSchema),
  async (c): Promise<Response> => {
    const {id} = c.req.valid('param');
    const useCase = c.var.container.resolve<ManageCustomerUseCase>(ManageCustomerUseCaseToken);

    await useCase.deleteCustomer(toDeleteCommand(id));

    return c.json(toSuccessResponse('Customer deleted successfully', {id}), 200);
  }
);

customerRouter.get('/customers', async (c): Promise<Response> => {
  const query = c.var.container.resolve<GetCustomerQuery>(GetCustomerQueryToken);
  const customers = await query.getAllCustomers();
  return c.json(toSuccessResponse('Customers retrieved successfully', customers), 200);
});

customerRouter.get(
  '/customers/:id',
  validate('param', CustomerIdParamSchema),
  async (c): Promise<Response> => {
    const {id} = c.req.valid('param');
    const query = c.var.container.resolve<GetCustomerQuery>(GetCustomerQueryToken);
    const customer = await query.getCustomerById(id);
    return c.json(toSuccessResponse('Customer retrieved successfully', customer), 200);
  }
);
