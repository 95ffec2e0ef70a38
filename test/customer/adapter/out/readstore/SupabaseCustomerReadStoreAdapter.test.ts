import "reflect-metadata"

import {describe, expect, it} from "vitest";
import {
    CUSTOMERS_READ_TABLE,
    SupabaseCustomerReadStoreAdapter,
} from "../../../../../src/customer/adapter/out/readstore/SupabaseCustomerReadStoreAdapter";
import type {CustomerQueryModel} from "../../../../../src/customer/application/domain/model/CustomerQueryModel";
import {createFakeSupabaseClient, emptyResponse, jsonResponse} from "../../../../helpers/fakeSupabaseFetch";

const customer: CustomerQueryModel = {
    id: "7",
    firstName: "Hanako",
    lastName: "Yamada",
    fullName: "Hanako Yamada",
    gender: "Female",
    email: "x@example.com",
    dateOfBirth: "1990-05-17",
};

const row = {
    id: "7",
    first_name: "Hanako",
    last_name: "Yamada",
    full_name: "Hanako Yamada",
    gender: "Female",
    email: "x@example.com",
    date_of_birth: "1990-05-17",
};

/**
 * SupabaseCustomerReadStoreAdapter のテスト
 */
describe("SupabaseCustomerReadStoreAdapter", () => {
    it("upsert は id で衝突を解決する", async () => {
        const {client, requests} = createFakeSupabaseClient(() => emptyResponse(201));

        await new SupabaseCustomerReadStoreAdapter(client).upsert(customer);

        expect(requests).toHaveLength(1);
        expect(requests[0]?.method).toBe("POST");
        expect(requests[0]?.url.pathname).toBe(`/rest/v1/${CUSTOMERS_READ_TABLE}`);
        expect(requests[0]?.url.searchParams.get("on_conflict")).toBe("id");
        expect(requests[0]?.body).toEqual(row);
    });

    it("deleteById は id で削除する", async () => {
        const {client, requests} = createFakeSupabaseClient(() => emptyResponse(204));

        await new SupabaseCustomerReadStoreAdapter(client).deleteById("7");

        expect(requests[0]?.method).toBe("DELETE");
        expect(requests[0]?.url.searchParams.get("id")).toBe("eq.7");
        expect(requests[0]?.url.searchParams.has("email")).toBe(false);
    });

    it("findById は行を読み取りモデルに変換する", async () => {
        const {client} = createFakeSupabaseClient(() => jsonResponse([row]));

        await expect(new SupabaseCustomerReadStoreAdapter(client).findById("7")).resolves.toEqual(customer);
    });

    it("findById は見つからなければ undefined", async () => {
        const {client} = createFakeSupabaseClient(() => jsonResponse([]));

        await expect(new SupabaseCustomerReadStoreAdapter(client).findById("7")).resolves.toBeUndefined();
    });

    it("findAll は全件を返す", async () => {
        const {client} = createFakeSupabaseClient(() => jsonResponse([row, {...row, id: "8", email: "y@example.com"}]));

        const customers = await new SupabaseCustomerReadStoreAdapter(client).findAll();

        expect(customers.map((found) => found.id)).toEqual(["7", "8"]);
    });

    it("エラーが返ったら例外を投げる", async () => {
        const {client} = createFakeSupabaseClient(() =>
            jsonResponse({message: "permission denied", code: "42501", details: null, hint: null}, 403)
        );

        await expect(new SupabaseCustomerReadStoreAdapter(client).upsert(customer)).rejects.toThrow(
            "Failed to upsert customer 7: permission denied"
        );
    });
});
