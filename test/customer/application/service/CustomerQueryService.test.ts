import "reflect-metadata"

import {beforeEach, describe, expect, it, vi} from "vitest";
import {InMemoryCacheAdapter} from "../../../../src/common/cache/adapter/InMemoryCacheAdapter";
import {createSilentLogger} from "../../../../src/common/logging/Logger";
import {InMemoryCustomerReadStoreAdapter} from "../../../../src/customer/adapter/out/readstore/InMemoryCustomerReadStoreAdapter";
import {CustomerNotFoundException} from "../../../../src/customer/application/domain/exception/CustomerExceptions";
import type {CustomerQueryModel} from "../../../../src/customer/application/domain/model/CustomerQueryModel";
import {CustomerQueryService} from "../../../../src/customer/application/service/CustomerQueryService";
import {createTestConfig} from "../../../helpers/pipeline";

const hanako: CustomerQueryModel = {
    id: "7",
    firstName: "Hanako",
    lastName: "Yamada",
    fullName: "Hanako Yamada",
    gender: "Female",
    email: "hanako@example.com",
    dateOfBirth: "1990-05-17",
};

/**
 * CustomerQueryService のテスト（キャッシュアサイド）
 */
describe("CustomerQueryService", () => {
    let readStore: InMemoryCustomerReadStoreAdapter;
    let cache: InMemoryCacheAdapter;
    let service: CustomerQueryService;

    beforeEach(async () => {
        readStore = new InMemoryCustomerReadStoreAdapter();
        cache = new InMemoryCacheAdapter();
        service = new CustomerQueryService(
            readStore,
            cache,
            createTestConfig({CACHE_TTL_SECONDS: "120"}),
            createSilentLogger()
        );
        await readStore.upsert(hanako);
    });

    it("1 回目は読み取りストア、2 回目はキャッシュから返す", async () => {
        const findAll = vi.spyOn(readStore, "findAll");

        await expect(service.getAllCustomers()).resolves.toEqual([hanako]);
        await expect(service.getAllCustomers()).resolves.toEqual([hanako]);

        expect(findAll).toHaveBeenCalledTimes(1);
    });

    it("設定された TTL でキャッシュに入れる", async () => {
        const set = vi.spyOn(cache, "set");

        await service.getCustomerById("7");

        expect(set).toHaveBeenCalledWith("GetCustomerByIdQuery_7", hanako, 120);
    });

    it("見つからなければ CustomerNotFoundException、キャッシュには入れない", async () => {
        await expect(service.getCustomerById("missing")).rejects.toBeInstanceOf(CustomerNotFoundException);

        expect(cache.has("GetCustomerByIdQuery_missing")).toBe(false);
    });

    it("キャッシュが削除されたら読み取りストアから読み直す", async () => {
        await service.getCustomerById("7");
        await readStore.upsert({...hanako, email: "x@example.com"});
        await cache.remove(["GetCustomerByIdQuery_7"]);

        await expect(service.getCustomerById("7")).resolves.toMatchObject({email: "x@example.com"});
    });

    it("キャッシュの読み書きに失敗しても読み取りストアの結果を返す", async () => {
        vi.spyOn(cache, "get").mockRejectedValue(new Error("redis unavailable"));
        vi.spyOn(cache, "set").mockRejectedValue(new Error("redis unavailable"));

        await expect(service.getAllCustomers()).resolves.toEqual([hanako]);
    });
});
