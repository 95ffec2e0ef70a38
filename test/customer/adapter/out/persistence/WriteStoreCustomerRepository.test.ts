import "reflect-metadata"

import {describe, expect, it} from "vitest";
import {Customer} from "../../../../../src/customer/application/domain/model/Customer";
import {buildInMemoryPipeline, customerProps} from "../../../../helpers/pipeline";

describe("WriteStoreCustomerRepository", () => {
    it("コミット済みの行から顧客を復元する（イベントは積まない）", async () => {
        const {repository, unitOfWork} = buildInMemoryPipeline();
        repository.add(Customer.create(customerProps(), "1"));
        await unitOfWork.commit();

        const loaded = await repository.findById("1");

        expect(loaded?.getEmail()).toBe("hanako@example.com");
        expect(loaded?.getDateOfBirth().toISOString()).toBe("1990-05-17T00:00:00.000Z");
        expect(loaded?.domainEvents).toHaveLength(0);
    });

    it("追跡中の集約があればそれを返す", async () => {
        const {repository} = buildInMemoryPipeline();
        const customer = Customer.create(customerProps(), "1");
        repository.add(customer);

        await expect(repository.findById("1")).resolves.toBe(customer);
        await expect(repository.findByEmail("HANAKO@example.com")).resolves.toBe(customer);
    });

    it("この作業単位で削除した顧客は見つからない", async () => {
        const {repository, unitOfWork} = buildInMemoryPipeline();
        repository.add(Customer.create(customerProps(), "1"));
        await unitOfWork.commit();

        const loaded = await repository.findById("1");
        if (!loaded) {
            throw new Error("customer 1 should exist");
        }
        loaded.delete();
        repository.remove(loaded);

        await expect(repository.findById("1")).resolves.toBeUndefined();
        await expect(repository.findByEmail("hanako@example.com")).resolves.toBeUndefined();
    });

    it("同じ作業単位で追加して削除した顧客も見つからない", async () => {
        const {repository} = buildInMemoryPipeline();
        const customer = Customer.create(customerProps(), "1");
        repository.add(customer);
        customer.delete();
        repository.remove(customer);

        await expect(repository.findById("1")).resolves.toBeUndefined();
        await expect(repository.findByEmail("hanako@example.com")).resolves.toBeUndefined();
    });

    it("存在しなければ undefined", async () => {
        const {repository} = buildInMemoryPipeline();

        await expect(repository.findById("missing")).resolves.toBeUndefined();
        await expect(repository.findByEmail("missing@example.com")).resolves.toBeUndefined();
    });
});
