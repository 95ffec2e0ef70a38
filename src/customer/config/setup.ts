import type {DependencyContainer} from 'tsyringe'
import type {EventDispatcher} from '../../common/event/EventDispatcher'
import type {Logger} from '../../common/logging/Logger'
import {LoggerToken} from '../../common/logging/Logger'
import {CUSTOMER_AGGREGATE_TYPE} from '../application/domain/event/CustomerEvents'
import type {
    CustomerCreatedEvent,
    CustomerDeletedEvent,
    CustomerUpdatedEvent,
} from '../application/domain/event/CustomerEvents'
import {CustomerProjectionHandler} from '../application/service/CustomerProjectionHandler'

/**
 * 顧客クエリ側（読み取りモデル）のイベント購読を設定する
 *
 * 1 つのイベントの種類につきハンドラーは 1 つ。
 */
export function setupCustomerQueryContext(
    dispatcher: EventDispatcher,
    container: DependencyContainer
): void {
    const logger = container.resolve<Logger>(LoggerToken)
    logger.info('🔔 Setting up customer query context...')

    const projectionHandler = container.resolve(CustomerProjectionHandler)

    dispatcher.subscribe<CustomerCreatedEvent>(
        CUSTOMER_AGGREGATE_TYPE,
        'created',
        (event) => projectionHandler.onCreated(event)
    )

    dispatcher.subscribe<CustomerUpdatedEvent>(
        CUSTOMER_AGGREGATE_TYPE,
        'updated',
        (event) => projectionHandler.onUpdated(event)
    )

    dispatcher.subscribe<CustomerDeletedEvent>(
        CUSTOMER_AGGREGATE_TYPE,
        'deleted',
        (event) => projectionHandler.onDeleted(event)
    )

    logger.info('✅ Customer query context setup complete')
}
