import {container} from 'tsyringe'
import type {DependencyContainer} from 'tsyringe'
import {EventDispatcher} from '../common/event/EventDispatcher'
import {setupCustomerQueryContext} from '../customer/config/setup'
import {setupContainer} from './container'
import type {AppConfig} from './env'

/**
 * アプリケーション全体の初期化
 *
 * 【責務】
 * 1. DIコンテナの設定（setupContainer）
 * 2. 各コンテキストのイベント購読（setupXxxContext）
 *
 * 同じコンテナを 2 回初期化しても、ハンドラーは 1 回しか登録されない。
 */

const initialized = new WeakSet<DependencyContainer>()

export function initializeApplication(
    config: AppConfig,
    target: DependencyContainer = container
): DependencyContainer {
    if (initialized.has(target)) {
        return target
    }

    // ① DIコンテナの設定
    setupContainer(config, target)

    // ② EventDispatcherを取得
    const dispatcher = target.resolve(EventDispatcher)

    // ③ 各コンテキストの初期化
    setupCustomerQueryContext(dispatcher, target)

    initialized.add(target)
    return target
}
