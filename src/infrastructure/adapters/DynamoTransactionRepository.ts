import { ConditionalCheckFailedException } from "@aws-sdk/client-dynamodb";
import {
  DynamoDBDocumentClient,
  GetCommand,
  TransactWriteCommand,
  UpdateCommand,
} from "@aws-sdk/lib-dynamodb";
import { v4 as uuidv4 } from "uuid";
import type { Transaction, TransactionDraft, TransactionStatus } from "../../core/entities/Transaction";
import type { ITimeProvider } from "../../core/providers/ITimeProvider";
import type { ITransactionRepository } from "../../core/repositories/ITransactionRepository";
import { conditionFailedAt } from "./dynamoClient";
import {
  parseTransactionItem,
  referenceKey,
  toTransactionAttributes,
  transactionKey,
} from "./dynamoItems";

export class DynamoTransactionRepository implements ITransactionRepository {
  constructor(
    private readonly docClient: DynamoDBDocumentClient,
    private readonly tableName: string,
    private readonly timeProvider: ITimeProvider
  ) {}

  async findOrCreate(draft: TransactionDraft): Promise<Transaction> {
    const timestamp = this.timeProvider.now().toISOString();
    const transaction: Transaction = {
      ...draft,
      id: uuidv4(),
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    try {
      await this.docClient.send(new TransactWriteCommand({
        TransactItems: [
          {
            Put: {
              TableName: this.tableName,
              Item: { ...referenceKey(draft.referenceId), txId: transaction.id, createdAt: timestamp },
              ConditionExpression: "attribute_not_exists(PK)",
            },
          },
          {
            Put: {
              TableName: this.tableName,
              Item: { ...transactionKey(transaction.id), ...toTransactionAttributes(transaction) },
            },
          },
        ],
      }));
      return transaction;
    } catch (error) {
      if (!conditionFailedAt(error, 0)) throw error;

      const existing = await this.findByReferenceId(draft.referenceId);
      if (!existing) {
        throw new Error(`Reference ${draft.referenceId} is claimed but its transaction is missing`, {
          cause: error,
        });
      }
      return existing;
    }
  }

  async findByReferenceId(referenceId: string): Promise<Transaction | null> {
    const claim = await this.docClient.send(new GetCommand({
      TableName: this.tableName,
      Key: referenceKey(referenceId),
      ConsistentRead: true,
    }));

    const txId: unknown = claim.Item?.txId;
    if (typeof txId !== "string") return null;

    const response = await this.docClient.send(new GetCommand({
      TableName: this.tableName,
      Key: transactionKey(txId),
      ConsistentRead: true,
    }));
    if (!response.Item) return null;

    return this.toTransaction(response.Item, txId);
  }

  async updateStatus(id: string, status: TransactionStatus): Promise<Transaction> {
    try {
      const response = await this.docClient.send(new UpdateCommand({
        TableName: this.tableName,
        Key: transactionKey(id),
        UpdateExpression: "SET #status = :status, updatedAt = :ts",
        ConditionExpression: "attribute_exists(PK)",
        ExpressionAttributeNames: { "#status": "status" },
        ExpressionAttributeValues: { ":status": status, ":ts": this.timeProvider.now().toISOString() },
        ReturnValues: "ALL_NEW",
      }));
      return this.toTransaction(response.Attributes, id);
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new Error(`Transaction not found: ${id}`, { cause: error });
      }
      throw error;
    }
  }

  private toTransaction(item: unknown, id: string): Transaction {
    const transaction = parseTransactionItem(item);
    if (!transaction.success) {
      throw new Error(`Malformed transaction item ${id}: ${transaction.error}`);
    }
    return transaction.data;
  }
}
