import { NextFunction, Request, RequestHandler, Response } from 'express';
import { z, ZodType, ZodTypeDef } from 'zod';
import { RequestValidationError } from '../utils/errors';

// Blank segments would otherwise coerce to 0
export const finiteNumber = z.string().trim().min(1).pipe(z.coerce.number().finite());

export const numberSeries = z.array(z.number().finite());

export function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(result.error);
  }
  return result.data;
}

// Express 4 does not catch rejected promises from handlers
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
