/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as base-10 strings (JSON has no bigint) and are
 * parsed into bigint here.
 */

import { z } from "zod";
import { isAccountId } from "@streamledger/types";
import { isAmountInRange } from "@streamledger/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

const AMOUNT_PATTERN = /^\d+$/;
const STREAM_ID_PATTERN = /^[1-9]\d*$/;

/**
 * Base-10 unsigned integer string → bigint. Surrounding whitespace is
 * ignored; leading zeros are accepted.
 */
export const AmountSchema = z.string().transform((value, ctx) => {
  const trimmed = value.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Amount must be an unsigned integer string",
      fatal: true,
    });
    return z.NEVER;
  }
  const amount = BigInt(trimmed);
  if (!isAmountInRange(amount)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Amount exceeds the 128-bit maximum",
      fatal: true,
    });
    return z.NEVER;
  }
  return amount;
});

export const AccountIdSchema = z
  .string()
  .refine(isAccountId, "Account ID must be a non-empty string");

export const UnixSecondsSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const StreamIdParamSchema = z.string().transform((value, ctx) => {
  const id = Number(value);
  if (!STREAM_ID_PATTERN.test(value) || !Number.isSafeInteger(id)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Stream ID must be a positive integer",
      fatal: true,
    });
    return z.NEVER;
  }
  return id;
});

// =============================================================================
// Account DTOs
// =============================================================================

export const DepositSchema = z.object({
  amount: AmountSchema.refine((v) => v > 0n, "Deposit must be positive"),
});

export type DepositDto = z.infer<typeof DepositSchema>;

// =============================================================================
// Stream DTOs
// =============================================================================

/**
 * `endDate` and `duration` are both optional here; the ledger reports
 * INVALID_TIME_PARAMETERS unless exactly one is present.
 */
export const CreateStreamSchema = z.object({
  recipient: AccountIdSchema,
  endDate: UnixSecondsSchema.optional(),
  duration: UnixSecondsSchema.optional(),
  amount: AmountSchema,
});

export type CreateStreamDto = z.infer<typeof CreateStreamSchema>;

export const WithdrawSchema = z.object({
  amount: AmountSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const ListStreamsQuerySchema = z.object({
  payer: AccountIdSchema.optional(),
  recipient: AccountIdSchema.optional(),
});

export type ListStreamsQuery = z.infer<typeof ListStreamsQuerySchema>;
