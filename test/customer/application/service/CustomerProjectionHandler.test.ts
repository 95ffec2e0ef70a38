import "reflect-metadata"

import {beforeEach, describe, expect, it, vi} from "vitest";
import {InMemoryCacheAdapter} from "../../../../src/common/cache/adapter/InMemoryCacheAdapter";
import {CacheInvalidator} from "../../../../src/common/cache/CacheInvalidator";
import {createSilentLogger} from "../../../../src/common/logging/Logger";
import {InMemoryCustomerReadStoreAdapter} from "../../../../src/customer/adapter/out/readstore/InMemoryCustomerReadStoreAdapter";
import {
    CustomerCreatedEvent,
    CustomerDeletedEvent,
    CustomerUpdatedEvent,
} from "../../../../src/customer/application/domain/event/CustomerEvents";
import {CustomerProjectionHandler} from "../../../../src/customer/application/service/CustomerProjectionHandler";

/**
 * CustomerProjectionHandler のテスト
 *
 * 【検証すること】
 * - 作成・更新は id をキーにした upsert（同じイベントを 2 回適用しても 1 件）
 * - 削除は id で行う（メールアドレスが変わっていても消える）
 * - 関係するキャッシュキーを削除する
 */
describe("CustomerProjectionHandler", () => {
    let readStore: InMemoryCustomerReadStoreAdapter;
    let cache: InMemoryCacheAdapter;
    let handler: CustomerProjectionHandler;

    const created = new CustomerCreatedEvent("7", "Hanako", "Yamada", "Female", "hanako@example.com", "1990-05-17");

    beforeEach(async () => {
        readStore = new InMemoryCustomerReadStoreAdapter();
        cache = new InMemoryCacheAdapter();
        handler = new CustomerProjectionHandler(
            readStore,
            new CacheInvalidator(cache, createSilentLogger()),
            createSilentLogger()
        );

        await cache.set("GetAllCustomerQuery", [], 60);
        await cache.set("GetCustomerByIdQuery_7", {}, 60);
        await cache.set("GetCustomerByIdQuery_8", {}, 60);
    });

    it("作成イベントを読み取りモデルとして保存し、キャッシュを削除する", async () => {
        await handler.onCreated(created);

        expect(await readStore.findById("7")).toEqual({
            id: "7",
            firstName: "Hanako",
            lastName: "Yamada",
            fullName: "Hanako Yamada",
            gender: "Female",
            email: "hanako@example.com",
            dateOfBirth: "1990-05-17",
        });
        expect(cache.has("GetAllCustomerQuery")).toBe(false);
        expect(cache.has("GetCustomerByIdQuery_7")).toBe(false);
        expect(cache.has("GetCustomerByIdQuery_8")).toBe(true);
    });

    it("同じ作成イベントを 2 回適用しても 1 件のまま", async () => {
        await handler.onCreated(created);
        await handler.onCreated(created);

        expect(readStore.size()).toBe(1);
    });

    it("更新イベントはレコード全体を置き換える", async () => {
        await handler.onCreated(created);

        await handler.onUpdated(
            new CustomerUpdatedEvent("7", "Hanako", "Yamada", "Female", "x@example.com", "1990-05-17")
        );

        expect(readStore.size()).toBe(1);
        expect(await readStore.findById("7")).toMatchObject({email: "x@example.com"});
    });

    it("同じ更新イベントを 2 回適用しても結果は変わらない", async () => {
        await handler.onCreated(created);
        const updated = new CustomerUpdatedEvent("7", "Hanako", "Yamada", "Female", "x@example.com", "1990-05-17");

        await handler.onUpdated(updated);
        await handler.onUpdated(updated);

        expect(readStore.size()).toBe(1);
        expect(await readStore.findById("7")).toMatchObject({email: "x@example.com"});
    });

    it("削除イベントは id で削除する（メールアドレスが変わっていても消える）", async () => {
        await handler.onCreated(created);
        await handler.onUpdated(
            new CustomerUpdatedEvent("7", "Hanako", "Yamada", "Female", "x@example.com", "1990-05-17")
        );

        await handler.onDeleted(new CustomerDeletedEvent("7", "hanako@example.com"));

        expect(readStore.size()).toBe(0);
        expect(cache.has("GetCustomerByIdQuery_7")).toBe(false);
    });

    it("同じ削除イベントを 2 回適用しても失敗しない", async () => {
        await handler.onCreated(created);
        const deleted = new CustomerDeletedEvent("7", "hanako@example.com");

        await handler.onDeleted(deleted);
        await expect(handler.onDeleted(deleted)).resolves.toBeUndefined();
    });

    it("キャッシュの削除に失敗しても投影は成功する", async () => {
        vi.spyOn(cache, "remove").mockRejectedValue(new Error("redis unavailable"));

        await expect(handler.onCreated(created)).resolves.toBeUndefined();
        expect(readStore.size()).toBe(1);
    });

    it("読み取りストアの更新に失敗したら例外を投げ、キャッシュは触らない", async () => {
        vi.spyOn(readStore, "upsert").mockRejectedValue(new Error("read store down"));

        await expect(handler.onCreated(created)).rejects.toThrow("read store down");
        expect(cache.has("GetCustomerByIdQuery_7")).toBe(true);
    });
});
