import type { Context } from "aws-lambda";
import { TransferError, toTransferError } from "../../core/errors/TransferError";
import type { ILogger } from "../../core/providers/ILogger";
import { TransferFundsUseCase } from "../../core/use-cases/TransferFundsUseCase";
import type { TransferResultDto } from "../events/dto/TransferResultDto";
import { toTransferParams, toTransferResultDto } from "../events/mappers/transferTaskMappers";
import { parseTransferTaskInput } from "../events/parsers/parseTransferTaskInput";

export interface TransferHandlerDependencies {
  useCase: TransferFundsUseCase;
  logger: ILogger;
  cancellationMarginMs: number;
}

export type TransferTaskHandler = (
  event: unknown,
  context: Pick<Context, "getRemainingTimeInMillis" | "awsRequestId">
) => Promise<TransferResultDto>;

/**
 * Step Functions task entry point. Failures are rethrown as `TransferError`,
 * whose name is the error code the state machine's Retry and Catch match on.
 */
export function createTransferHandler(deps: TransferHandlerDependencies): TransferTaskHandler {
  const { useCase, logger, cancellationMarginMs } = deps;

  return async (event, context) => {
    try {
      const parseResult = parseTransferTaskInput(event);
      if (!parseResult.success) {
        throw TransferError.invalidParams(parseResult.error);
      }

      const budgetMs = context.getRemainingTimeInMillis() - cancellationMarginMs;
      const signal =
        budgetMs > 0 ? AbortSignal.timeout(budgetMs) : AbortSignal.abort(new Error("Lambda deadline reached"));
      const result = await useCase.execute(toTransferParams(parseResult.data), { signal });

      return toTransferResultDto(result);
    } catch (error: unknown) {
      const transferError = toTransferError(error);
      logger.error("Transfer task failed", {
        requestId: context.awsRequestId,
        code: transferError.code,
        retryable: transferError.retryable,
        message: transferError.message,
        details: transferError.details,
      });
      throw transferError;
    }
  };
}
