import { beforeEach, describe, expect, it } from "vitest";
import { some } from "../../entities/Option";
import { TransferError } from "../../errors/TransferError";
import { InMemoryAccountRepository } from "../../../testing/InMemoryAccountRepository";
import { InMemoryTransactionRepository } from "../../../testing/InMemoryTransactionRepository";
import {
  FIXED_NOW,
  FixedTimeProvider,
  RecordingLogger,
  buildTransferParams,
  destinationAccount,
  sourceAccount,
} from "../../../testing/fixtures";
import { TransferFundsUseCase } from "../TransferFundsUseCase";

describe("TransferFundsUseCase", () => {
  let accounts: InMemoryAccountRepository;
  let transactions: InMemoryTransactionRepository;
  let logger: RecordingLogger;
  let useCase: TransferFundsUseCase;

  beforeEach(() => {
    const timeProvider = new FixedTimeProvider();
    accounts = new InMemoryAccountRepository([sourceAccount(), destinationAccount()]);
    transactions = new InMemoryTransactionRepository(timeProvider);
    logger = new RecordingLogger();
    useCase = new TransferFundsUseCase({ accounts, transactions, timeProvider, logger });
  });

  async function captureError(promise: Promise<unknown>): Promise<TransferError> {
    try {
      await promise;
    } catch (error) {
      if (error instanceof TransferError) return error;
      throw error;
    }
    throw new Error("expected the transfer to fail");
  }

  describe("successful transfer", () => {
    it("moves amount plus fee out of the source and amount into the destination", async () => {
      const result = await useCase.execute(buildTransferParams({ fee: 10 }));

      expect(accounts.balanceOf("acc-source")).toBe(690);
      expect(accounts.balanceOf("acc-destination")).toBe(300);
      expect(result.sourceTransactionReferenceId).toBe("ref-out");
      expect(result.destinationTransactionReferenceId).toBe("ref-in");
      expect(result.feeTransactionReferenceId).toBe("ref-fee");
    });

    it("creates three ledger entries with matching reference ids, all SUCCESS", async () => {
      const result = await useCase.execute(buildTransferParams({ fee: 10 }));

      const stored = transactions.all();
      expect(stored).toHaveLength(3);
      expect(stored.map((transaction) => transaction.status)).toEqual(["SUCCESS", "SUCCESS", "SUCCESS"]);
      expect(stored.map((transaction) => transaction.referenceId).sort()).toEqual(["ref-fee", "ref-in", "ref-out"]);

      expect(result.sourceTransaction).toEqual({
        id: "tx-1",
        userId: "user-1",
        accountId: "acc-source",
        amount: 300,
        currency: "EUR",
        referenceId: "ref-out",
        status: "SUCCESS",
        type: "OUTBOUND",
        metadata: {
          version: 1,
          operationType: "Transfer",
          linkedTransactionId: "ref-out",
          linkedAccountId: "acc-source",
          counterpartAccountId: "acc-destination",
          timestamp: FIXED_NOW,
        },
        createdAt: FIXED_NOW,
        updatedAt: FIXED_NOW,
      });
      expect(result.destinationTransaction.id).toBe("tx-3");
      expect(result.destinationTransaction.type).toBe("INBOUND");
      expect(result.destinationTransaction.userId).toBe("user-2");
      expect(result.destinationTransaction.metadata.counterpartAccountId).toBe("acc-source");

      expect(result.feeTransaction.present).toBe(true);
      if (result.feeTransaction.present) {
        expect(result.feeTransaction.value.id).toBe("tx-2");
        expect(result.feeTransaction.value.amount).toBe(10);
        expect(result.feeTransaction.value.type).toBe("OUTGOING_FEE");
        expect(result.feeTransaction.value.status).toBe("SUCCESS");
        expect(result.feeTransaction.value.metadata.operationType).toBe("Fee Transfer");
      }
    });

    it("creates no fee entry when no fee is given", async () => {
      const result = await useCase.execute(buildTransferParams());

      expect(result.feeTransaction).toEqual({ present: false });
      expect(transactions.all().map((transaction) => transaction.type)).toEqual(["OUTBOUND", "INBOUND"]);
      expect(await transactions.findByReferenceId("ref-fee")).toBeNull();
      expect(accounts.balanceOf("acc-source")).toBe(700);
    });

    it("carries caller metadata onto every ledger entry", async () => {
      const result = await useCase.execute(
        buildTransferParams({ fee: 5, metadata: some({ note: "rent", externalReference: "inv-7" }) })
      );

      expect(result.sourceTransaction.metadata.note).toBe("rent");
      expect(result.destinationTransaction.metadata.externalReference).toBe("inv-7");
      if (result.feeTransaction.present) {
        expect(result.feeTransaction.value.metadata.note).toBe("rent");
      }
    });

    it("logs completion once at info level", async () => {
      await useCase.execute(buildTransferParams({ fee: 10 }));

      expect(logger.messages("info")).toEqual(["transfer completed"]);
      expect(logger.messages("debug")).toEqual([
        "transfer state MATERIALIZING",
        "transfer state BALANCING",
        "transfer state FINALIZING",
      ]);
    });
  });

  describe("validation failures", () => {
    it("fails with InsufficientBalance before creating any entry or moving money", async () => {
      accounts.save(sourceAccount({ balance: 100 }));

      const error = await captureError(useCase.execute(buildTransferParams()));

      expect(error.code).toBe("InsufficientBalance");
      expect(error.retryable).toBe(false);
      expect(error.details).toEqual({ accountId: "acc-source", required: 300, balance: 100 });
      expect(transactions.createCalls).toBe(0);
      expect(accounts.balanceOf("acc-source")).toBe(100);
      expect(accounts.balanceOf("acc-destination")).toBe(0);
    });

    it("counts the fee towards the required balance", async () => {
      accounts.save(sourceAccount({ balance: 305 }));

      const error = await captureError(useCase.execute(buildTransferParams({ fee: 10 })));

      expect(error.code).toBe("InsufficientBalance");
      expect(error.message).toBe("insufficient balance on acc-source: transfer amount 310, account balance 305");
    });

    it("reports an inactive destination as InactiveAccount even when the balance is short", async () => {
      accounts.save(sourceAccount({ balance: 100 }));
      accounts.save(destinationAccount({ status: "INACTIVE" }));

      const error = await captureError(useCase.execute(buildTransferParams()));

      expect(error.code).toBe("InactiveAccount");
      expect(error.details).toEqual({ accountId: "acc-destination", status: "INACTIVE" });
      expect(transactions.createCalls).toBe(0);
    });

    it("fails with AccountNotFound for an unknown destination", async () => {
      const error = await captureError(
        useCase.execute(buildTransferParams({ destinationAccountId: "acc-missing" }))
      );

      expect(error.code).toBe("AccountNotFound");
      expect(error.message).toBe("account not found: acc-missing");
    });

    it("rejects invalid parameters before touching storage", async () => {
      const error = await captureError(
        useCase.execute(buildTransferParams({ destinationTransactionReferenceId: "ref-out" }))
      );

      expect(error.code).toBe("InvalidTransferParams");
      expect(error.retryable).toBe(false);
      expect(transactions.createCalls).toBe(0);
    });
  });

  describe("retries", () => {
    it("re-running a completed transfer returns the same entries and moves money once", async () => {
      const first = await useCase.execute(buildTransferParams({ fee: 10 }));
      const second = await useCase.execute(buildTransferParams({ fee: 10 }));

      expect(second.sourceTransaction.id).toBe(first.sourceTransaction.id);
      expect(second.destinationTransaction.id).toBe(first.destinationTransaction.id);
      expect(transactions.all()).toHaveLength(3);
      expect(accounts.balanceOf("acc-source")).toBe(690);
      expect(accounts.balanceOf("acc-destination")).toBe(300);
      expect(logger.messages("info")).toEqual([
        "transfer completed",
        "balance change already applied by an earlier attempt",
        "transfer completed",
      ]);
    });

    it("surfaces a failed credit as a retryable PartialCompletion and recovers on retry", async () => {
      accounts.failNextUpdate("INCREASE", new Error("throttled"));

      const error = await captureError(useCase.execute(buildTransferParams({ fee: 10 })));

      expect(error.code).toBe("PartialCompletion");
      expect(error.retryable).toBe(true);
      expect(accounts.balanceOf("acc-source")).toBe(690);
      expect(accounts.balanceOf("acc-destination")).toBe(0);

      const result = await useCase.execute(buildTransferParams({ fee: 10 }));

      expect(accounts.balanceOf("acc-source")).toBe(690);
      expect(accounts.balanceOf("acc-destination")).toBe(300);
      expect(result.destinationTransaction.status).toBe("SUCCESS");
    });

    it("surfaces a failed finalization as PartialCompletion and leaves later entries PENDING", async () => {
      transactions.failNextStatusUpdate("ref-in", new Error("connection reset"));

      const error = await captureError(useCase.execute(buildTransferParams({ fee: 10 })));

      expect(error.code).toBe("PartialCompletion");
      expect(error.details).toEqual({
        operation: "transaction finalization",
        failedReferenceId: "ref-in",
        finalizedReferenceIds: ["ref-out"],
      });
      const statuses = Object.fromEntries(
        transactions.all().map((transaction) => [transaction.referenceId, transaction.status])
      );
      expect(statuses).toEqual({ "ref-out": "SUCCESS", "ref-fee": "PENDING", "ref-in": "PENDING" });

      await useCase.execute(buildTransferParams({ fee: 10 }));

      expect(transactions.all().every((transaction) => transaction.status === "SUCCESS")).toBe(true);
      expect(accounts.balanceOf("acc-source")).toBe(690);
    });
  });

  describe("cancellation", () => {
    it("stops before validating when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await captureError(useCase.execute(buildTransferParams(), { signal: controller.signal }));

      expect(error.code).toBe("TransferCancelled");
      expect(error.message).toBe("transfer cancelled before VALIDATING");
      expect(transactions.createCalls).toBe(0);
    });

    it("stops between steps without moving balances", async () => {
      const controller = new AbortController();
      const abortingAccounts = new InMemoryAccountRepository([sourceAccount(), destinationAccount()]);
      const lookups = abortingAccounts.getById.bind(abortingAccounts);
      abortingAccounts.getById = async (id) => {
        const account = await lookups(id);
        if (id === "acc-destination") controller.abort();
        return account;
      };
      const timeProvider = new FixedTimeProvider();
      const cancellable = new TransferFundsUseCase({
        accounts: abortingAccounts,
        transactions,
        timeProvider,
        logger,
      });

      const error = await captureError(cancellable.execute(buildTransferParams(), { signal: controller.signal }));

      expect(error.code).toBe("TransferCancelled");
      expect(error.message).toBe("transfer cancelled before MATERIALIZING");
      expect(transactions.createCalls).toBe(0);
      expect(abortingAccounts.balanceOf("acc-source")).toBe(1000);
    });
  });

  describe("persistence failures", () => {
    it("classifies a failed account lookup as retryable", async () => {
      accounts.failLookups(new Error("timeout"));

      const error = await captureError(useCase.execute(buildTransferParams()));

      expect(error.code).toBe("PersistenceFailure");
      expect(error.retryable).toBe(true);
      expect(error.message).toBe("account lookup failed: timeout");
    });

    it("classifies a failed ledger entry creation as non-retryable", async () => {
      transactions.failNextCreate("ref-in", new Error("validation exception"));

      const error = await captureError(useCase.execute(buildTransferParams()));

      expect(error.code).toBe("PersistenceFailure");
      expect(error.retryable).toBe(false);
      expect(error.message).toBe("creating pending incoming transaction failed: validation exception");
      expect(accounts.balanceOf("acc-source")).toBe(1000);
    });
  });
});
