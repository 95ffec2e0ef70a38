import {z} from 'zod';

/**
 * 'true' / 'false' の文字列を boolean に変換する
 */
const booleanString = z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true');

/**
 * 環境変数のスキーマ
 *
 * 【ドライバーの切り替え】
 * - USE_SUPABASE=true → イベントストアと読み取りストアに Supabase を使う
 * - DATABASE_URL あり → 書き込みストアに PostgreSQL を使う
 * - REDIS_URL あり → キャッシュに Redis を使う
 *
 * どれも指定しなければ全て InMemory で動く。
 */
export const AppConfigSchema = z
    .object({
        NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
        PORT: z.coerce.number().int().positive().default(3000),
        LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
        USE_SUPABASE: booleanString,
        SUPABASE_URL: z.string().url().optional(),
        SUPABASE_PUBLISHABLE_KEY: z.string().min(1).optional(),
        DATABASE_URL: z.string().min(1).optional(),
        REDIS_URL: z.string().min(1).optional(),
        CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
        COMMIT_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
        COMMIT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(100),
    })
    .superRefine((config, ctx) => {
        if (config.USE_SUPABASE && (!config.SUPABASE_URL || !config.SUPABASE_PUBLISHABLE_KEY)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'SUPABASE_URL and SUPABASE_PUBLISHABLE_KEY are required when USE_SUPABASE=true',
                path: ['USE_SUPABASE'],
            });
        }
    });

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * 環境変数を検証して設定オブジェクトを作る
 *
 * @throws Error 環境変数が不正な場合（どの変数が不正かをメッセージに含める）
 */
export function loadAppConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const result = AppConfigSchema.safeParse(env);

    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${issues}`);
    }

    return result.data;
}
