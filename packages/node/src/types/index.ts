/**
 * Type barrel — re-exports all public types from @vestline/node.
 */

// DTOs
export {
  AddressSchema,
  AmountSchema,
  UnixSecondsSchema,
  IdParamSchema,
  PaginationQuerySchema,
  CreateAllocationSchema,
  AirdropSchema,
  ManagerSchema,
  CreateScheduleSchema,
  AmountBodySchema,
  BatchForceRevokeSchema,
  AsOfQuerySchema,
  ListEventsQuerySchema,
  ClaimHistoryQuerySchema,
  LedgerNameSchema,
  RoleChangeSchema,
} from "./dto.js";
export type {
  CreateAllocationDto,
  AirdropDto,
  ManagerDto,
  CreateScheduleDto,
  AmountBodyDto,
  BatchForceRevokeDto,
  AsOfQuery,
  ListEventsQuery,
  ClaimHistoryQuery,
  LedgerName,
  RoleChangeDto,
} from "./dto.js";

// Views
export {
  allocationView,
  airdropView,
  scheduleView,
  vestingInfoView,
  summaryView,
  claimView,
  discrepancyView,
  totalsView,
  statsView,
} from "./views.js";
export type {
  AllocationView,
  AirdropView,
  ScheduleView,
  VestingInfoView,
} from "./views.js";

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
export type { AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
