import type {DependencyContainer} from 'tsyringe';

/**
 * Hono のコンテキストに載せる値の型定義
 */
export interface AppEnv {
    Variables: {
        /** リクエストごとの子コンテナ（1 リクエスト = 1 作業単位） */
        container: DependencyContainer;
    };
}
