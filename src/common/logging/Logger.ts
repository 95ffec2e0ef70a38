import {pino} from 'pino'
import type {Logger} from 'pino'

export type {Logger}

/**
 * ロガーの生成オプション
 */
export interface LoggerOptions {
    level: string
    /** false にするとログを一切出力しない（主にテスト用） */
    enabled?: boolean
}

/**
 * アプリケーション共通のロガーを生成する
 *
 * 【構造化ログ】
 * pino は 1 行 1 JSON で出力する。トランザクションIDなどは
 * メッセージ文字列に埋め込まず、オブジェクトのフィールドとして渡す。
 *
 * ```typescript
 * logger.info({ transactionId }, '🔄 Begin transaction')
 * ```
 */
export function createLogger(options: LoggerOptions): Logger {
    return pino({
        name: 'shop',
        level: options.level,
        enabled: options.enabled ?? true,
    })
}

/**
 * 何も出力しないロガー
 */
export function createSilentLogger(): Logger {
    return createLogger({level: 'silent', enabled: false})
}

export const LoggerToken = Symbol('Logger')
