/**
 * Type barrel — re-exports all public types from @centwise/server.
 */

// DTOs
export {
  AmountSchema,
  EntityIdSchema,
  CreatedAtSchema,
  IdParamSchema,
  PaginationQuerySchema,
  NameSchema,
  CreateExpenseSchema,
  UpdateExpenseSchema,
  CreateIncomeSchema,
  UpdateIncomeSchema,
  CreateTransferSchema,
  UpdateTransferSchema,
  SalarySchema,
  RandomSalarySchema,
  ListEntriesQuerySchema,
  ListTransfersQuerySchema,
  ReportQuerySchema,
  CashflowQuerySchema,
  TransferTotalQuerySchema,
} from "./dto.js";
export type {
  IdParam,
  NameDto,
  CreateExpenseDto,
  UpdateExpenseDto,
  CreateIncomeDto,
  UpdateIncomeDto,
  CreateTransferDto,
  UpdateTransferDto,
  SalaryDto,
  RandomSalaryDto,
  ListEntriesQuery,
  ListTransfersQuery,
  ReportQueryDto,
  CashflowQueryDto,
  TransferTotalQueryDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { JwtHeaderSchema, JwtClaimsSchema } from "./auth.js";
export type { AuthContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
