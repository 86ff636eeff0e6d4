import { DynamoDBDocumentClient, GetCommand, TransactWriteCommand } from "@aws-sdk/lib-dynamodb";
import type { Account, BalanceUpdate, BalanceUpdateOutcome } from "../../core/entities/Account";
import type { ITimeProvider } from "../../core/providers/ITimeProvider";
import type { IAccountRepository } from "../../core/repositories/IAccountRepository";
import { conditionFailedAt } from "./dynamoClient";
import { accountKey, balanceMarkerKey, parseAccountItem } from "./dynamoItems";

export class DynamoAccountRepository implements IAccountRepository {
  constructor(
    private readonly docClient: DynamoDBDocumentClient,
    private readonly tableName: string,
    private readonly timeProvider: ITimeProvider
  ) {}

  async getById(id: string): Promise<Account | null> {
    const response = await this.docClient.send(new GetCommand({
      TableName: this.tableName,
      Key: accountKey(id),
      ConsistentRead: true,
    }));

    if (!response.Item) return null;

    const account = parseAccountItem(response.Item);
    if (!account.success) {
      throw new Error(`Malformed account item ${id}: ${account.error}`);
    }
    return account.data;
  }

  // The marker item and the balance change commit together, so a replayed
  // reference id fails the marker condition instead of moving the balance twice.
  async updateBalance(update: BalanceUpdate): Promise<BalanceUpdateOutcome> {
    const delta = update.operation === "INCREASE" ? update.amount : -update.amount;
    const timestamp = this.timeProvider.now().toISOString();

    try {
      await this.docClient.send(new TransactWriteCommand({
        TransactItems: [
          {
            Put: {
              TableName: this.tableName,
              Item: {
                ...balanceMarkerKey(update.referenceId),
                accountId: update.accountId,
                operation: update.operation,
                amount: update.amount,
                appliedAt: timestamp,
              },
              ConditionExpression: "attribute_not_exists(PK)",
            },
          },
          {
            Update: {
              TableName: this.tableName,
              Key: accountKey(update.accountId),
              UpdateExpression: "SET updatedAt = :ts ADD balance :delta",
              ConditionExpression: "attribute_exists(PK)",
              ExpressionAttributeValues: { ":delta": delta, ":ts": timestamp },
            },
          },
        ],
      }));
      return "APPLIED";
    } catch (error) {
      if (conditionFailedAt(error, 0)) return "ALREADY_APPLIED";
      if (conditionFailedAt(error, 1)) {
        throw new Error(`Account ${update.accountId} disappeared before its balance update`, { cause: error });
      }
      throw error;
    }
  }
}
