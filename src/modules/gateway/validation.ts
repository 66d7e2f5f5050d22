/**
 * CyberSource Gateway - Input Validation
 * Caller input is checked here, before any request document exists.
 */

import { z } from 'zod';
import { ValidationError } from '../../shared/errors';

const MinorUnitsSchema = z.union([
  z.bigint().nonnegative(),
  z.number().int().nonnegative(),
]);

export const CreditCardSchema = z.object({
  number: z.string().min(1, 'card number is required'),
  month: z.number().int().min(1).max(12),
  year: z.number().int().positive(),
  brand: z.string().min(1, 'card brand is required'),
  verificationValue: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
});

export const AddressSchema = z.object({
  address1: z.string().optional(),
  address2: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  zip: z.string().optional(),
  country: z.string().optional(),
  email: z.string().optional(),
});

export const LineItemSchema = z.object({
  unitPrice: MinorUnitsSchema,
  quantity: z.number().int().positive(),
  productCode: z.string(),
  productName: z.string(),
  productSKU: z.string(),
});

export const OrderIdSchema = z
  .string({ required_error: 'orderId is required' })
  .min(1, 'orderId is required')
  .refine((value) => !value.includes(';'), 'orderId must not contain ";"');

export const AuthorizationSchema = z
  .string({ required_error: 'authorization is required' })
  .min(1, 'authorization is required');

export const LineItemListSchema = z.array(LineItemSchema).min(1, 'at least one line item is required');

/**
 * Run a schema and turn its issues into a ValidationError
 */
export function validate<T>(schema: z.ZodType<T>, value: unknown, field: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => {
        const path = [field, ...issue.path].join('.');
        return `${path}: ${issue.message}`;
      })
    );
  }
  return result.data;
}
