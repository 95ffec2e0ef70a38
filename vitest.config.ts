import {defineConfig} from "vitest/config";

/**
 * テストは全て Node.js 上で完結する。
 * Supabase / PostgreSQL / Redis には接続せず、InMemory アダプターと
 * フェイク fetch を使う。
 */
export default defineConfig({
    test: {
        environment: "node",
        include: ["test/**/*.test.ts"],
        restoreMocks: true,
    },
});
