/**
 * DI用のトークン（外部クライアント）
 *
 * ポートのトークンは各ポートの定義ファイルに置く。
 * ここには、アダプターが直接受け取るクライアントだけを置く。
 */
export const SupabaseClientToken = Symbol('SupabaseClient');
export const PgPoolToken = Symbol('PgPool');
export const RedisClientToken = Symbol('RedisClient');

export const AppConfigToken = Symbol('AppConfig');
