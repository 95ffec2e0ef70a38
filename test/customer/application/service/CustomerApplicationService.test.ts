import "reflect-metadata"

import {beforeEach, describe, expect, it, vi} from "vitest";
import {CUSTOMERS_TABLE} from "../../../../src/customer/adapter/out/persistence/CustomerPersister";
import {
    CustomerNotFoundException,
    DuplicateEmailException,
} from "../../../../src/customer/application/domain/exception/CustomerExceptions";
import {
    CreateCustomerCommand,
    DeleteCustomerCommand,
    UpdateCustomerCommand,
} from "../../../../src/customer/application/port/in/CustomerCommands";
import {CustomerApplicationService} from "../../../../src/customer/application/service/CustomerApplicationService";
import {buildInMemoryPipeline} from "../../../helpers/pipeline";

function createCommand(email = "hanako@example.com"): CreateCustomerCommand {
    return new CreateCustomerCommand("Hanako", "Yamada", "Female", email, new Date("1990-05-17T00:00:00.000Z"));
}

/**
 * CustomerApplicationService の統合テスト
 *
 * 【テスト戦略】
 * - ポートは全て InMemory の実装を使う
 * - コマンド → 書き込みストア → イベントストア → 読み取りストアまで通して確認する
 */
describe("CustomerApplicationService（統合テスト）", () => {
    let pipeline: ReturnType<typeof buildInMemoryPipeline>;
    let service: CustomerApplicationService;

    beforeEach(() => {
        pipeline = buildInMemoryPipeline();
        service = new CustomerApplicationService(pipeline.repository, pipeline.unitOfWork, pipeline.logger);
    });

    describe("createCustomer", () => {
        it("顧客を作成し、読み取りストアにも反映される", async () => {
            const customerId = await service.createCustomer(createCommand());

            expect(pipeline.database.count(CUSTOMERS_TABLE)).toBe(1);
            expect(await pipeline.readStore.findById(customerId)).toMatchObject({
                id: customerId,
                fullName: "Hanako Yamada",
                email: "hanako@example.com",
            });
            expect((await pipeline.eventStore.findByAggregateId(customerId)).map((record) => record.messageType))
                .toEqual(["CustomerCreatedEvent"]);
        });

        it("メールアドレスが使われていたら DuplicateEmailException、何も書き込まない", async () => {
            await service.createCustomer(createCommand());

            await expect(service.createCustomer(createCommand("HANAKO@example.com"))).rejects.toBeInstanceOf(
                DuplicateEmailException
            );

            expect(pipeline.database.count(CUSTOMERS_TABLE)).toBe(1);
            expect(pipeline.eventStore.all()).toHaveLength(1);
        });
    });

    describe("updateCustomer", () => {
        it("メールアドレスを変更し、読み取りストアも更新される", async () => {
            const customerId = await service.createCustomer(createCommand());

            await service.updateCustomer(new UpdateCustomerCommand(customerId, "new@example.com"));

            expect(await pipeline.readStore.findById(customerId)).toMatchObject({email: "new@example.com"});
            expect(await pipeline.writeStore.findRow(CUSTOMERS_TABLE, customerId)).toMatchObject({
                email: "new@example.com",
            });
        });

        it("同じアドレスならコミットしない", async () => {
            const customerId = await service.createCustomer(createCommand());
            const commit = vi.spyOn(pipeline.unitOfWork, "commit");

            await service.updateCustomer(new UpdateCustomerCommand(customerId, "hanako@example.com"));

            expect(commit).not.toHaveBeenCalled();
        });

        it("他の顧客のアドレスには変更できない", async () => {
            await service.createCustomer(createCommand("first@example.com"));
            const secondId = await service.createCustomer(createCommand("second@example.com"));

            await expect(
                service.updateCustomer(new UpdateCustomerCommand(secondId, "first@example.com"))
            ).rejects.toBeInstanceOf(DuplicateEmailException);
        });

        it("存在しない顧客なら CustomerNotFoundException", async () => {
            await expect(
                service.updateCustomer(new UpdateCustomerCommand("missing", "a@example.com"))
            ).rejects.toBeInstanceOf(CustomerNotFoundException);
        });
    });

    describe("deleteCustomer", () => {
        it("書き込みストアと読み取りストアの両方から消える", async () => {
            const customerId = await service.createCustomer(createCommand());

            await service.deleteCustomer(new DeleteCustomerCommand(customerId));

            expect(pipeline.database.count(CUSTOMERS_TABLE)).toBe(0);
            expect(await pipeline.readStore.findById(customerId)).toBeUndefined();
            expect((await pipeline.eventStore.findByAggregateId(customerId)).map((record) => record.messageType))
                .toEqual(["CustomerCreatedEvent", "CustomerDeletedEvent"]);
        });

        it("存在しない顧客なら CustomerNotFoundException", async () => {
            await expect(service.deleteCustomer(new DeleteCustomerCommand("missing"))).rejects.toBeInstanceOf(
                CustomerNotFoundException
            );
        });
    });
});
