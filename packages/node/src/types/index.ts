/**
 * Type barrel: re-exports all public types from @ledgersync/node.
 */

// DTOs
export {
  CurrencyCodeSchema,
  LedgerLineSchema,
  LinesSchema,
  SanitizeRequestSchema,
  ResolveRateRequestSchema,
  JournalPreviewRequestSchema,
  TransitoryAccountRequestSchema,
} from "./dto.js";
export type {
  LedgerLineDto,
  SanitizeRequestDto,
  ResolveRateRequestDto,
  JournalPreviewRequestDto,
  TransitoryAccountRequestDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, validationErrorEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  HttpErrorCode,
  ErrorDetail,
  ErrorEnvelope,
  ValidationIssue,
} from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
