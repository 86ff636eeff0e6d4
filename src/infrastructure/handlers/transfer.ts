import type { Handler } from "aws-lambda";
import { TransferFundsUseCase } from "../../core/use-cases/TransferFundsUseCase";
import { DynamoAccountRepository } from "../adapters/DynamoAccountRepository";
import { DynamoTransactionRepository } from "../adapters/DynamoTransactionRepository";
import { createDocumentClient } from "../adapters/dynamoClient";
import { loadConfig } from "../config";
import type { TransferResultDto } from "../events/dto/TransferResultDto";
import { createJsonLogger } from "../logging/createJsonLogger";
import { SystemTimeProvider } from "../providers/SystemTimeProvider";
import { createTransferHandler } from "./createTransferHandler";

const config = loadConfig();
const logger = createJsonLogger({ level: config.logLevel });
const docClient = createDocumentClient();
const timeProvider = new SystemTimeProvider();

const useCase = new TransferFundsUseCase({
  accounts: new DynamoAccountRepository(docClient, config.tableName, timeProvider),
  transactions: new DynamoTransactionRepository(docClient, config.tableName, timeProvider),
  timeProvider,
  logger,
});

export const handler: Handler<unknown, TransferResultDto> = createTransferHandler({
  useCase,
  logger,
  cancellationMarginMs: config.cancellationMarginMs,
});
