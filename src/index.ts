import 'reflect-metadata';
import {Hono} from 'hono';
import {HTTPException} from 'hono/http-exception';
import {container} from 'tsyringe';
import type {DependencyContainer} from 'tsyringe';
import type {Logger} from './common/logging/Logger';
import {LoggerToken} from './common/logging/Logger';
import {EventPropagationException, WriteConflictException} from './common/persistence/exception/PersistenceExceptions';
import type {UnitOfWork} from './common/persistence/port/UnitOfWork';
import {UnitOfWorkToken} from './common/persistence/port/UnitOfWork';
import {initializeApplication} from './config/app-initializer';
import type {AppConfig} from './config/env';
import {customerRouter} from './customer/adapter/in/web/CustomerController';
import {toErrorResponse} from './customer/adapter/in/web/mappers/CustomerMapper';
import {
    CustomerNotFoundException,
    DuplicateEmailException,
    InvalidCustomerException,
} from './customer/application/domain/exception/CustomerExceptions';
import type {AppEnv} from './types/bindings';

/**
 * Honoアプリケーションを組み立てる
 *
 * @param target 登録先のコンテナ（テストでは子コンテナを渡す）
 */
export function createApp(config: AppConfig, target: DependencyContainer = container): Hono<AppEnv> {
    initializeApplication(config, target);

    const logger = target.resolve<Logger>(LoggerToken).child({component: 'http'});
    const app = new Hono<AppEnv>();

    // ルートエンドポイント
    app.get('/', (c) => {
        return c.json({
            message: 'Shop consistency pipeline API',
            version: '1.0.0',
            endpoints: {
                createCustomer: 'POST /api/customers',
                updateCustomer: 'PUT /api/customers/:id',
                deleteCustomer: 'DELETE /api/customers/:id',
                listCustomers: 'GET /api/customers',
                getCustomer: 'GET /api/customers/:id',
            },
        });
    });

    // ヘルスチェックエンドポイント（接続情報は出さない）
    app.get('/health', (c) => {
        return c.json({
            status: 'healthy',
            drivers: {
                writeStore: config.DATABASE_URL ? 'postgres' : 'memory',
                eventStore: config.USE_SUPABASE ? 'supabase' : 'memory',
                readStore: config.USE_SUPABASE ? 'supabase' : 'memory',
                cache: config.REDIS_URL ? 'redis' : 'memory',
            },
        });
    });

    // 1 リクエスト = 1 作業単位（子コンテナ）
    // 解放するのは、このリクエストで実際に作られた作業単位だけ
    app.use('/api/*', async (c, next) => {
        const scope = target.createChildContainer();
        const unitsOfWork = new Set<UnitOfWork>();
        scope.afterResolution<UnitOfWork>(
            UnitOfWorkToken,
            (_token, result) => {
                (Array.isArray(result) ? result : [result]).forEach((unitOfWork) => unitsOfWork.add(unitOfWork));
            },
            {frequency: 'Always'}
        );

        c.set('container', scope);
        try {
            await next();
        } finally {
            await Promise.all([...unitsOfWork].map((unitOfWork) => unitOfWork.dispose()));
        }
    });

    // APIルーターをマウント
    app.route('/api', customerRouter);

    app.notFound((c) => c.json(toErrorResponse(`Route not found: ${c.req.method} ${c.req.path}`, 'NOT_FOUND'), 404));

    app.onError((error, c) => {
        // ===== ビジネスロジックエラー =====

        if (error instanceof InvalidCustomerException) {
            return c.json(toErrorResponse(error.message, 'INVALID_CUSTOMER', {field: error.field}), 400);
        }

        if (error instanceof CustomerNotFoundException) {
            return c.json(
                toErrorResponse(error.message, 'CUSTOMER_NOT_FOUND', {customerId: error.customerId}),
                404
            );
        }

        if (error instanceof DuplicateEmailException) {
            return c.json(toErrorResponse(error.message, 'DUPLICATE_EMAIL', {email: error.email}), 409);
        }

        // 同時に同じメールアドレスで登録された場合など（書き込みストアの一意制約）
        if (error instanceof WriteConflictException) {
            return c.json(
                toErrorResponse('The request conflicts with existing data', 'WRITE_CONFLICT', {
                    constraint: error.constraint,
                }),
                409
            );
        }

        if (error instanceof HTTPException) {
            return error.getResponse();
        }

        // ===== その他のエラー =====

        const expose = config.NODE_ENV !== 'production';

        // 書き込みは確定済みなので、クライアントには取引IDを返す
        if (error instanceof EventPropagationException) {
            logger.error({err: error, transactionId: error.transactionId}, 'Event propagation failed after commit');
            return c.json(
                toErrorResponse(expose ? error.message : 'Internal server error', 'EVENT_PROPAGATION_FAILED', {
                    transactionId: error.transactionId,
                    phase: error.phase,
                }),
                500
            );
        }

        logger.error({err: error, path: c.req.path}, 'Unexpected error');

        return c.json(toErrorResponse(expose ? error.message : 'Internal server error', 'INTERNAL_ERROR'), 500);
    });

    return app;
}
