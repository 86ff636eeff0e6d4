import { describe, expect, it } from "vitest";
import { InMemoryAccountRepository } from "../../../../testing/InMemoryAccountRepository";
import { buildTransferParams, destinationAccount, sourceAccount } from "../../../../testing/fixtures";
import { BalanceUpdater } from "../BalanceUpdater";

describe("BalanceUpdater", () => {
  const validAccounts = { source: sourceAccount(), destination: destinationAccount() };

  it("debits amount plus fee from the source, then credits the amount", async () => {
    const accounts = new InMemoryAccountRepository([sourceAccount(), destinationAccount()]);

    const report = await new BalanceUpdater(accounts).apply(buildTransferParams({ fee: 10 }), validAccounts);

    expect(report).toEqual({ debit: "APPLIED", credit: "APPLIED" });
    expect(accounts.appliedUpdates).toEqual([
      { accountId: "acc-source", amount: 310, operation: "DECREASE", referenceId: "ref-out" },
      { accountId: "acc-destination", amount: 300, operation: "INCREASE", referenceId: "ref-in" },
    ]);
  });

  it("does not move balances again for reference ids already applied", async () => {
    const accounts = new InMemoryAccountRepository([sourceAccount(), destinationAccount()]);
    const updater = new BalanceUpdater(accounts);

    await updater.apply(buildTransferParams(), validAccounts);
    const report = await updater.apply(buildTransferParams(), validAccounts);

    expect(report).toEqual({ debit: "ALREADY_APPLIED", credit: "ALREADY_APPLIED" });
    expect(accounts.balanceOf("acc-source")).toBe(700);
    expect(accounts.balanceOf("acc-destination")).toBe(300);
  });

  it("reports a failed debit as a retryable persistence failure", async () => {
    const accounts = new InMemoryAccountRepository([sourceAccount(), destinationAccount()]);
    accounts.failNextUpdate("DECREASE", new Error("throttled"));

    await expect(new BalanceUpdater(accounts).apply(buildTransferParams(), validAccounts)).rejects.toMatchObject({
      code: "PersistenceFailure",
      retryable: true,
    });
    expect(accounts.balanceOf("acc-destination")).toBe(0);
  });

  it("reports a failed credit after the debit as PartialCompletion with the applied leg", async () => {
    const accounts = new InMemoryAccountRepository([sourceAccount(), destinationAccount()]);
    accounts.failNextUpdate("INCREASE", new Error("throttled"));

    await expect(
      new BalanceUpdater(accounts).apply(buildTransferParams({ fee: 10 }), validAccounts)
    ).rejects.toMatchObject({
      code: "PartialCompletion",
      details: {
        operation: "destination balance increase",
        debitedAccountId: "acc-source",
        debitedAmount: 310,
        debitReferenceId: "ref-out",
        creditAccountId: "acc-destination",
        creditAmount: 300,
      },
    });
    expect(accounts.balanceOf("acc-source")).toBe(690);
  });
});
