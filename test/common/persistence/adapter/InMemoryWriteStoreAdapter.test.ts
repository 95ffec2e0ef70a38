import "reflect-metadata"

import {beforeEach, describe, expect, it} from "vitest";
import {createSilentLogger} from "../../../../src/common/logging/Logger";
import {InMemoryWriteDatabase} from "../../../../src/common/persistence/adapter/InMemoryWriteDatabase";
import {InMemoryWriteStoreAdapter} from "../../../../src/common/persistence/adapter/InMemoryWriteStoreAdapter";
import {PersisterRegistry} from "../../../../src/common/persistence/AggregatePersister";
import {WriteConflictException} from "../../../../src/common/persistence/exception/PersistenceExceptions";
import {CustomerPersister, CUSTOMERS_TABLE} from "../../../../src/customer/adapter/out/persistence/CustomerPersister";
import {Customer} from "../../../../src/customer/application/domain/model/Customer";
import {customerProps} from "../../../helpers/pipeline";

describe("InMemoryWriteStoreAdapter", () => {
    let database: InMemoryWriteDatabase;
    let store: InMemoryWriteStoreAdapter;

    beforeEach(() => {
        database = new InMemoryWriteDatabase();
        store = new InMemoryWriteStoreAdapter(
            database,
            new PersisterRegistry([new CustomerPersister()]),
            {maxRetryCount: 0, baseDelayMs: 0},
            createSilentLogger()
        );
    });

    it("コミットするまで書き込みは見えない", async () => {
        store.changeTracker.track(Customer.create(customerProps(), "1"), "added");

        const transaction = await store.beginTransaction("read committed");
        await expect(store.saveChanges(transaction)).resolves.toBe(1);

        expect(await store.findRow(CUSTOMERS_TABLE, "1")).toBeUndefined();

        await transaction.commit();

        expect(await store.findRow(CUSTOMERS_TABLE, "1")).toEqual({
            id: "1",
            first_name: "Hanako",
            last_name: "Yamada",
            gender: "Female",
            email: "hanako@example.com",
            date_of_birth: "1990-05-17",
        });
    });

    it("ロールバックすると何も残らない", async () => {
        store.changeTracker.track(Customer.create(customerProps(), "1"), "added");

        const transaction = await store.beginTransaction("read committed");
        await store.saveChanges(transaction);
        await transaction.rollback();

        expect(database.count(CUSTOMERS_TABLE)).toBe(0);
    });

    it("完了したトランザクションは再利用できない", async () => {
        const transaction = await store.beginTransaction("read committed");
        await transaction.commit();

        await expect(transaction.commit()).rejects.toThrow(/has already completed/);
    });

    it("deleted の集約は行を削除する", async () => {
        const customer = Customer.create(customerProps(), "1");
        store.changeTracker.track(customer, "added");
        const first = await store.beginTransaction("read committed");
        await store.saveChanges(first);
        await first.commit();
        store.changeTracker.acceptChanges();

        store.changeTracker.track(customer, "deleted");
        const second = await store.beginTransaction("read committed");
        await store.saveChanges(second);
        await second.commit();

        expect(database.count(CUSTOMERS_TABLE)).toBe(0);
    });

    it("一意列が重複すると WriteConflictException", async () => {
        store.changeTracker.track(Customer.create(customerProps({email: "same@example.com"}), "1"), "added");
        store.changeTracker.track(Customer.create(customerProps({email: "same@example.com"}), "2"), "added");

        const transaction = await store.beginTransaction("read committed");
        const error: unknown = await store.saveChanges(transaction).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(WriteConflictException);
        if (error instanceof WriteConflictException) {
            expect(error.constraint).toBe("customers.email");
        }
    });

    it("findRowsBy は列の値で検索する", async () => {
        store.changeTracker.track(Customer.create(customerProps({email: "a@example.com"}), "1"), "added");
        store.changeTracker.track(Customer.create(customerProps({email: "b@example.com"}), "2"), "added");
        const transaction = await store.beginTransaction("read committed");
        await store.saveChanges(transaction);
        await transaction.commit();

        const rows = await store.findRowsBy(CUSTOMERS_TABLE, "email", "b@example.com");

        expect(rows.map((row) => row.id)).toEqual(["2"]);
    });

    it("dispose() はコミットされなかった追跡を捨てる", async () => {
        store.changeTracker.track(Customer.create(customerProps(), "1"), "added");

        await store.dispose();

        expect(store.changeTracker.hasChanges()).toBe(false);
    });
});
