import { BadRequestException, HttpException } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { ZodError, ZodTypeAny, z } from 'zod';
import { LoggerService } from '../logging/logger.service';

/**
 * Parses request input, turning schema failures into an `invalid_input` 400
 * that lists every issue.
 */
export function parseInput<TSchema extends ZodTypeAny>(
  schema: TSchema,
  value: unknown,
): z.infer<TSchema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw invalidInput(result.error);
  }
  return result.data;
}

/**
 * Runs a controller action with a request id, logging the outcome and how
 * long it took. HTTP exceptions pass through unchanged.
 */
export async function handleRequest<T>(
  logger: LoggerService,
  op: string,
  context: Record<string, unknown>,
  action: () => Promise<T>,
): Promise<T> {
  const requestId = randomUUID();
  const startTime = Date.now();

  try {
    const result = await action();
    logger.log({
      ...context,
      requestId,
      op,
      outcome: 'success',
      durationMs: Date.now() - startTime,
    });
    return result;
  } catch (error) {
    logger.error(`${op} failed`, error, {
      ...context,
      requestId,
      op,
      outcome: 'error',
      durationMs: Date.now() - startTime,
    });

    if (error instanceof HttpException) {
      throw error;
    }
    if (error instanceof ZodError) {
      throw invalidInput(error);
    }
    throw error;
  }
}

function invalidInput(error: ZodError): BadRequestException {
  return new BadRequestException({
    error: 'invalid_input',
    detail: error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; '),
    issues: error.issues,
  });
}
