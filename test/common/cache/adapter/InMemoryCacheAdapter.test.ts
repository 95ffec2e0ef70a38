import {describe, expect, it} from "vitest";
import {z} from "zod";
import {InMemoryCacheAdapter} from "../../../../src/common/cache/adapter/InMemoryCacheAdapter";

const parseNames = (value: unknown): string[] => z.array(z.string()).parse(value);

describe("InMemoryCacheAdapter", () => {
    it("保存した値を取り出せる（中身はコピー）", async () => {
        const cache = new InMemoryCacheAdapter();
        const names = ["a", "b"];

        await cache.set("names", names, 60);
        names.push("c");

        await expect(cache.get("names", parseNames)).resolves.toEqual(["a", "b"]);
    });

    it("有効期限が切れたら null", async () => {
        let now = 1_000;
        const cache = new InMemoryCacheAdapter(() => now);

        await cache.set("names", ["a"], 10);
        now += 9_999;
        await expect(cache.get("names", parseNames)).resolves.toEqual(["a"]);

        now += 1;
        await expect(cache.get("names", parseNames)).resolves.toBeNull();
        expect(cache.has("names")).toBe(false);
    });

    it("remove() は存在しないキーを無視する", async () => {
        const cache = new InMemoryCacheAdapter();
        await cache.set("a", 1, 60);

        await cache.remove(["a", "missing"]);

        expect(cache.has("a")).toBe(false);
    });
});
