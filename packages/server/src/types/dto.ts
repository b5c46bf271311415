/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query/param validation; amount
 * formats and business rules are checked by the ledger itself.
 */

import { z } from "zod";
import { CASHFLOW_GROUPINGS } from "@centwise/reports";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Decimal amount as a string ("12.50") or a JSON number (12.5). */
export const AmountSchema = z
  .union([z.string().trim().min(1), z.number().finite()])
  .transform((value) => (typeof value === "number" ? String(value) : value));

export const EntityIdSchema = z.number().int().positive();

const QueryIdSchema = z.coerce.number().int().positive();

/** Inclusive period bound: "YYYY-MM" or "YYYY-MM-DD". Parsed by the reports package. */
const PeriodBoundSchema = z.string().optional();

export const CreatedAtSchema = z.string().datetime({ offset: true }).optional();

export const IdParamSchema = z.object({
  id: QueryIdSchema,
});

export type IdParam = z.infer<typeof IdParamSchema>;

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Account & Category DTOs
// =============================================================================

export const NameSchema = z.object({
  name: z.string(),
});

export type NameDto = z.infer<typeof NameSchema>;

// =============================================================================
// Entry DTOs
// =============================================================================

export const CreateExpenseSchema = z.object({
  accountId: EntityIdSchema,
  categoryId: EntityIdSchema,
  amount: AmountSchema,
  description: z.string(),
  createdAt: CreatedAtSchema,
});

export type CreateExpenseDto = z.infer<typeof CreateExpenseSchema>;

export const UpdateExpenseSchema = CreateExpenseSchema.omit({ createdAt: true }).partial();

export type UpdateExpenseDto = z.infer<typeof UpdateExpenseSchema>;

export const CreateIncomeSchema = z.object({
  accountId: EntityIdSchema,
  amount: AmountSchema,
  description: z.string(),
  createdAt: CreatedAtSchema,
});

export type CreateIncomeDto = z.infer<typeof CreateIncomeSchema>;

export const UpdateIncomeSchema = CreateIncomeSchema.omit({ createdAt: true }).partial();

export type UpdateIncomeDto = z.infer<typeof UpdateIncomeSchema>;

export const CreateTransferSchema = z.object({
  fromAccountId: EntityIdSchema,
  toAccountId: EntityIdSchema,
  amount: AmountSchema,
  createdAt: CreatedAtSchema,
});

export type CreateTransferDto = z.infer<typeof CreateTransferSchema>;

export const UpdateTransferSchema = CreateTransferSchema.omit({ createdAt: true }).partial();

export type UpdateTransferDto = z.infer<typeof UpdateTransferSchema>;

export const SalarySchema = z.object({
  accountId: EntityIdSchema,
  amount: AmountSchema,
  createdAt: CreatedAtSchema,
});

export type SalaryDto = z.infer<typeof SalarySchema>;

export const RandomSalarySchema = z.object({
  accountId: EntityIdSchema,
  min: AmountSchema,
  max: AmountSchema,
});

export type RandomSalaryDto = z.infer<typeof RandomSalarySchema>;

// =============================================================================
// List & Report Queries
// =============================================================================

export const ListEntriesQuerySchema = PaginationQuerySchema.extend({
  accountId: QueryIdSchema.optional(),
  start: PeriodBoundSchema,
  end: PeriodBoundSchema,
});

export type ListEntriesQuery = z.infer<typeof ListEntriesQuerySchema>;

export const ListTransfersQuerySchema = PaginationQuerySchema.extend({
  fromAccountId: QueryIdSchema.optional(),
  toAccountId: QueryIdSchema.optional(),
  start: PeriodBoundSchema,
  end: PeriodBoundSchema,
});

export type ListTransfersQuery = z.infer<typeof ListTransfersQuerySchema>;

export const ReportQuerySchema = z.object({
  accountId: QueryIdSchema.optional(),
  start: PeriodBoundSchema,
  end: PeriodBoundSchema,
});

export type ReportQueryDto = z.infer<typeof ReportQuerySchema>;

export const CashflowQuerySchema = ReportQuerySchema.extend({
  by: z.enum(CASHFLOW_GROUPINGS).default("none"),
});

export type CashflowQueryDto = z.infer<typeof CashflowQuerySchema>;

export const TransferTotalQuerySchema = z.object({
  fromAccountId: QueryIdSchema.optional(),
  toAccountId: QueryIdSchema.optional(),
  start: PeriodBoundSchema,
  end: PeriodBoundSchema,
});

export type TransferTotalQueryDto = z.infer<typeof TransferTotalQuerySchema>;
