import { z } from 'zod';
import { ValidationError } from './errors.js';

export const symbolSchema = z.string().trim().min(1, 'symbol is required');

export const sideSchema = z
  .string()
  .trim()
  .transform((s) => s.toUpperCase())
  .pipe(z.enum(['BUY', 'SELL'], { errorMap: () => ({ message: 'side must be BUY or SELL' }) }));

/** Upper bound for quantities and prices; also rules out Infinity. */
export const MAX_ORDER_NUMBER = 1e15;

export const positiveNumber = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .positive(`${name} must be a positive number`)
    .max(MAX_ORDER_NUMBER, `${name} is too large`);

export const orderIdSchema = z
  .number({ invalid_type_error: 'orderId must be a number' })
  .int('orderId must be an integer')
  .positive('orderId must be a positive integer')
  .max(Number.MAX_SAFE_INTEGER, 'orderId is too large');

export const marketOrderSchema = z.object({
  symbol: symbolSchema,
  side: sideSchema,
  quantity: positiveNumber('quantity')
});

export const limitOrderSchema = marketOrderSchema.extend({
  price: positiveNumber('price')
});

export const stopLimitOrderSchema = marketOrderSchema.extend({
  stopPrice: positiveNumber('stopPrice'),
  limitPrice: positiveNumber('limitPrice')
});

export const orderLookupSchema = z.object({
  symbol: symbolSchema,
  orderId: orderIdSchema
});

/** Parse `input` or throw a ValidationError naming every failed field. */
export const validate = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => i.message).join('; ');
    throw new ValidationError(`Invalid order parameters: ${details}`, {
      fields: parsed.error.issues.map((i) => i.path.join('.'))
    });
  }
  return parsed.data;
};
