/**
 * DIコンテナ設定ファイル
 *
 * 【tsyringe の基本用語】
 * - Token: 依存オブジェクトを識別するためのキー（通常はSymbol）
 * - register: コンテナに「このTokenならこのクラス/値を使う」というルールを登録
 * - resolve: Tokenを指定して、対応するインスタンスを取得
 * - inject: クラスのコンストラクタで、どの依存が必要かを宣言
 *
 * 【スコープ】
 * - シングルトン: ロガー、ディスパッチャー、イベントストア、読み取りストア、キャッシュ、
 *   クライアント（pg の Pool、Redis、Supabase）
 * - ContainerScoped: 書き込みストア、UnitOfWork、リポジトリ
 *   リクエストごとに container.createChildContainer() で子コンテナを作り、
 *   その中で 1 つの作業単位（ChangeTracker）を共有する
 */

import 'reflect-metadata'; // tsyringe が必要とするメタデータ機能を有効化
import {createClient} from '@supabase/supabase-js';
import type {SupabaseClient} from '@supabase/supabase-js';
import {Redis} from 'ioredis';
import {Pool} from 'pg';
import {container, Lifecycle} from 'tsyringe';
import type {DependencyContainer} from 'tsyringe';
import {InMemoryCacheAdapter} from '../common/cache/adapter/InMemoryCacheAdapter';
import {RedisCacheAdapter} from '../common/cache/adapter/RedisCacheAdapter';
import {CacheInvalidator} from '../common/cache/CacheInvalidator';
import type {CacheServicePort} from '../common/cache/port/CacheServicePort';
import {CacheServicePortToken} from '../common/cache/port/CacheServicePort';
import {InMemoryEventStoreAdapter} from '../common/event/adapter/InMemoryEventStoreAdapter';
import {SupabaseEventStoreAdapter} from '../common/event/adapter/SupabaseEventStoreAdapter';
import {EventDispatcher} from '../common/event/EventDispatcher';
import type {EventStorePort} from '../common/event/port/EventStorePort';
import {EventStorePortToken} from '../common/event/port/EventStorePort';
import type {Logger} from '../common/logging/Logger';
import {createLogger, LoggerToken} from '../common/logging/Logger';
import {InMemoryWriteDatabase} from '../common/persistence/adapter/InMemoryWriteDatabase';
import {InMemoryWriteStoreAdapter} from '../common/persistence/adapter/InMemoryWriteStoreAdapter';
import {PostgresWriteStoreAdapter} from '../common/persistence/adapter/PostgresWriteStoreAdapter';
import {PersisterRegistry} from '../common/persistence/AggregatePersister';
import type {RetrySettings} from '../common/persistence/ExecutionStrategy';
import {RetrySettingsToken} from '../common/persistence/ExecutionStrategy';
import {UnitOfWorkToken} from '../common/persistence/port/UnitOfWork';
import {WriteStorePortToken} from '../common/persistence/port/WriteStorePort';
import {TransactionalUnitOfWork} from '../common/persistence/TransactionalUnitOfWork';
import {CustomerPersister} from '../customer/adapter/out/persistence/CustomerPersister';
import {WriteStoreCustomerRepository} from '../customer/adapter/out/persistence/WriteStoreCustomerRepository';
import {InMemoryCustomerReadStoreAdapter} from '../customer/adapter/out/readstore/InMemoryCustomerReadStoreAdapter';
import {SupabaseCustomerReadStoreAdapter} from '../customer/adapter/out/readstore/SupabaseCustomerReadStoreAdapter';
import {GetCustomerQueryToken} from '../customer/application/port/in/GetCustomerQuery';
import {ManageCustomerUseCaseToken} from '../customer/application/port/in/ManageCustomerUseCase';
import {CustomerReadStorePortToken} from '../customer/application/port/out/CustomerReadStorePort';
import {CustomerRepositoryToken} from '../customer/application/port/out/CustomerRepository';
import {CustomerApplicationService} from '../customer/application/service/CustomerApplicationService';
import {CustomerProjectionHandler} from '../customer/application/service/CustomerProjectionHandler';
import {CustomerQueryService} from '../customer/application/service/CustomerQueryService';
import type {AppConfig} from './env';
import {AppConfigToken, PgPoolToken, RedisClientToken, SupabaseClientToken} from './types';

/**
 * Supabase の接続情報を取り出す（USE_SUPABASE=true のときは env.ts で必須にしている）
 */
function supabaseCredentials(config: AppConfig): {url: string; key: string} {
    if (!config.SUPABASE_URL || !config.SUPABASE_PUBLISHABLE_KEY) {
        throw new Error('SUPABASE_URL and SUPABASE_PUBLISHABLE_KEY are required when USE_SUPABASE=true');
    }
    return {url: config.SUPABASE_URL, key: config.SUPABASE_PUBLISHABLE_KEY};
}

/**
 * DIコンテナへの依存関係の登録
 *
 * 【処理の流れ】
 * 1. 設定・ロガー・リトライ設定の登録
 * 2. 書き込みストア（InMemory または PostgreSQL）
 * 3. イベントストアと読み取りストア（InMemory または Supabase）
 * 4. キャッシュ（InMemory または Redis）
 * 5. イベント配信・UnitOfWork
 * 6. 顧客コンテキストのサービス
 *
 * @param target 登録先（テストでは子コンテナを渡す）
 */
export function setupContainer(config: AppConfig, target: DependencyContainer = container): DependencyContainer {
    // ========================================
    // 1. 設定オブジェクトの登録
    // ========================================

    const logger = createLogger({level: config.LOG_LEVEL});
    logger.info('🚀 Initializing DI container...');

    target.register(AppConfigToken, {useValue: config});
    target.register<Logger>(LoggerToken, {useValue: logger});
    target.register<RetrySettings>(RetrySettingsToken, {
        useValue: {
            maxRetryCount: config.COMMIT_MAX_RETRIES,
            baseDelayMs: config.COMMIT_RETRY_DELAY_MS,
        },
    });
    target.register(PersisterRegistry, {
        useValue: new PersisterRegistry([new CustomerPersister()]),
    });

    // ========================================
    // 2. 書き込みストア
    // ========================================

    /**
     * ChangeTracker を持つので作業単位（子コンテナ）ごとに 1 つ
     */
    if (config.DATABASE_URL) {
        logger.info('🐘 Using PostgreSQL write store');

        const pool = new Pool({connectionString: config.DATABASE_URL});
        pool.on('error', (error) => logger.error({err: error}, '❌ PostgreSQL pool error'));

        target.register(PgPoolToken, {useValue: pool});
        target.register(WriteStorePortToken, {useClass: PostgresWriteStoreAdapter}, {
            lifecycle: Lifecycle.ContainerScoped,
        });
    } else {
        logger.info('💾 Using InMemory write store');

        target.registerSingleton(InMemoryWriteDatabase, InMemoryWriteDatabase);
        target.register(WriteStorePortToken, {useClass: InMemoryWriteStoreAdapter}, {
            lifecycle: Lifecycle.ContainerScoped,
        });
    }

    // ========================================
    // 3. イベントストア・読み取りストア
    // ========================================

    if (config.USE_SUPABASE) {
        logger.info('📦 Using Supabase event store and read store');

        const {url, key} = supabaseCredentials(config);

        const supabaseClient = createClient(url, key, {
            auth: {
                persistSession: false, // サーバー側ではセッション永続化不要
            },
            global: {
                headers: {
                    'x-application-name': 'shop-consistency-pipeline',
                },
            },
        });

        target.register<SupabaseClient>(SupabaseClientToken, {useValue: supabaseClient});
        target.registerSingleton(EventStorePortToken, SupabaseEventStoreAdapter);
        target.registerSingleton(CustomerReadStorePortToken, SupabaseCustomerReadStoreAdapter);
    } else {
        logger.info('💾 Using InMemory event store and read store');

        target.registerSingleton(EventStorePortToken, InMemoryEventStoreAdapter);
        target.registerSingleton(CustomerReadStorePortToken, InMemoryCustomerReadStoreAdapter);
    }

    // ========================================
    // 4. キャッシュ
    // ========================================

    if (config.REDIS_URL) {
        logger.info('🧊 Using Redis cache');

        const redis = new Redis(config.REDIS_URL, {lazyConnect: true, maxRetriesPerRequest: 1});
        redis.on('error', (error: unknown) => logger.warn({err: error}, '⚠️  Redis error'));

        target.register(RedisClientToken, {useValue: redis});
        target.registerSingleton(CacheServicePortToken, RedisCacheAdapter);
    } else {
        target.register<CacheServicePort>(CacheServicePortToken, {useValue: new InMemoryCacheAdapter()});
    }

    target.registerSingleton(CacheInvalidator, CacheInvalidator);

    // ========================================
    // 5. イベント配信・UnitOfWork
    // ========================================

    target.registerSingleton(EventDispatcher, EventDispatcher);
    target.register(UnitOfWorkToken, {useClass: TransactionalUnitOfWork}, {
        lifecycle: Lifecycle.ContainerScoped,
    });

    // ========================================
    // 6. 顧客コンテキスト
    // ========================================

    target.register(CustomerRepositoryToken, {useClass: WriteStoreCustomerRepository}, {
        lifecycle: Lifecycle.ContainerScoped,
    });
    target.register(ManageCustomerUseCaseToken, {useClass: CustomerApplicationService});
    target.registerSingleton(CustomerProjectionHandler, CustomerProjectionHandler);
    target.registerSingleton(GetCustomerQueryToken, CustomerQueryService);

    // イベント購読設定は app-initializer.ts で行う

    logger.info(
        {
            writeStore: config.DATABASE_URL ? 'postgres' : 'memory',
            supabase: config.USE_SUPABASE,
            cache: config.REDIS_URL ? 'redis' : 'memory',
        },
        '✅ DI container initialized'
    );

    return target;
}

/**
 * 共有している接続（pg の Pool、イベントストア、キャッシュ）を閉じる
 *
 * プロセス終了時に 1 回だけ呼ぶ。
 */
export async function closeContainer(target: DependencyContainer = container): Promise<void> {
    if (target.isRegistered(PgPoolToken)) {
        await target.resolve<Pool>(PgPoolToken).end();
    }
    await target.resolve<EventStorePort>(EventStorePortToken).dispose();
    await target.resolve<CacheServicePort>(CacheServicePortToken).dispose();
}
