import {describe, expect, it} from "vitest";
import {captureDomainEvents, requeueCapturedEvents} from "../../../src/common/event/EventCapture";
import {Customer} from "../../../src/customer/application/domain/model/Customer";
import {customerProps} from "../../helpers/pipeline";

/**
 * captureDomainEvents のテスト
 *
 * 【検証すること】
 * - 集約ごとのキュー順が保たれる
 * - イベントとイベントストアレコードが 1 対 1・同じ順
 * - 収集後はキューが空になる
 * - requeueCapturedEvents でキューに戻せる
 */
describe("captureDomainEvents", () => {
    it("集約ごとのキュー順を保ってイベントを収集し、キューを空にする", () => {
        const first = Customer.create(customerProps({email: "first@example.com"}), "1");
        first.changeEmail("first-changed@example.com");
        const second = Customer.create(customerProps({email: "second@example.com"}), "2");

        const captured = captureDomainEvents([first, second]);

        expect(captured.domainEvents.map((event) => [event.aggregateId, event.eventType])).toEqual([
            ["1", "CustomerCreatedEvent"],
            ["1", "CustomerUpdatedEvent"],
            ["2", "CustomerCreatedEvent"],
        ]);
        expect(first.domainEvents).toHaveLength(0);
        expect(second.domainEvents).toHaveLength(0);
    });

    it("イベント 1 件につきレコードを 1 件、同じ順で作る", () => {
        const customer = Customer.create(customerProps(), "7");
        customer.changeEmail("x@example.com");

        const captured = captureDomainEvents([customer]);

        expect(captured.eventStoreRecords).toHaveLength(2);
        captured.eventStoreRecords.forEach((record, index) => {
            const event = captured.domainEvents[index];
            expect(record.aggregateId).toBe("7");
            expect(record.messageType).toBe(event?.eventType);
            expect(record.occurredOn).toBe(event?.occurredOn);
        });
    });

    it("レコードの data はイベントの JSON（occurredOn は ISO 文字列）", () => {
        const customer = Customer.create(customerProps(), "7");

        const [record] = captureDomainEvents([customer]).eventStoreRecords;
        const data: unknown = JSON.parse(record?.data ?? "null");

        expect(data).toMatchObject({
            id: "7",
            aggregateType: "Customer",
            eventKind: "created",
            email: "hanako@example.com",
            dateOfBirth: "1990-05-17",
        });
        expect(data).toHaveProperty("occurredOn", record?.occurredOn.toISOString());
    });

    it("保留中のイベントが無ければ空を返す", () => {
        const customer = Customer.reconstitute("1", customerProps());

        const captured = captureDomainEvents([customer]);

        expect(captured.domainEvents).toEqual([]);
        expect(captured.eventStoreRecords).toEqual([]);
        expect(captured.sources).toEqual([]);
    });

    it("requeueCapturedEvents は収集したイベントをキューの先頭に戻す", () => {
        const customer = Customer.create(customerProps(), "1");
        const captured = captureDomainEvents([customer]);

        // 収集後に積まれたイベント
        customer.changeEmail("later@example.com");
        requeueCapturedEvents(captured);

        expect(customer.domainEvents.map((event) => event.eventType)).toEqual([
            "CustomerCreatedEvent",
            "CustomerUpdatedEvent",
        ]);

        // 戻したイベントは同じインスタンス（eventId も同じ）
        expect(customer.domainEvents[0]).toBe(captured.domainEvents[0]);
    });
});
