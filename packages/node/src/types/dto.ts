/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as decimal integer strings and are parsed to bigint here;
 * addresses are normalized to lower case.
 */

import { z } from "zod";
import { isAddress, isLedgerEventSource, isLedgerEventType } from "@vestline/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine(isAddress, { message: "Expected a 0x-prefixed 20-byte hex address" });

/** Non-negative decimal integer string → bigint. Positivity is a ledger rule. */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a decimal integer string")
  .transform((value) => BigInt(value));

export const UnixSecondsSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const IdParamSchema = z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Allocation DTOs
// =============================================================================

export const CreateAllocationSchema = z.object({
  beneficiary: AddressSchema,
  amount: AmountSchema,
});

export type CreateAllocationDto = z.infer<typeof CreateAllocationSchema>;

export const AirdropSchema = z.object({
  beneficiaries: z.array(AddressSchema).max(500),
  amounts: z.array(AmountSchema).max(500),
});

export type AirdropDto = z.infer<typeof AirdropSchema>;

export const ManagerSchema = z.object({
  account: AddressSchema,
});

export type ManagerDto = z.infer<typeof ManagerSchema>;

// =============================================================================
// Schedule DTOs
// =============================================================================

export const CreateScheduleSchema = z.object({
  beneficiary: AddressSchema,
  totalAmount: AmountSchema,
  startTime: UnixSecondsSchema,
  cliffDuration: UnixSecondsSchema,
  duration: UnixSecondsSchema,
  allocationId: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
});

export type CreateScheduleDto = z.infer<typeof CreateScheduleSchema>;

/** Body of a manual unlock or an allocation reduction. */
export const AmountBodySchema = z.object({
  amount: AmountSchema,
});

export type AmountBodyDto = z.infer<typeof AmountBodySchema>;

export const BatchForceRevokeSchema = z.object({
  scheduleIds: z.array(z.number().int()).max(500),
});

export type BatchForceRevokeDto = z.infer<typeof BatchForceRevokeSchema>;

export const AsOfQuerySchema = z.object({
  at: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).optional(),
});

export type AsOfQuery = z.infer<typeof AsOfQuerySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  source: z.string().refine(isLedgerEventSource, { message: "Unknown event source" }).optional(),
  type: z.string().refine(isLedgerEventType, { message: "Unknown event type" }).optional(),
  correlationId: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ClaimHistoryQuerySchema = z.object({
  beneficiary: AddressSchema.optional(),
});

export type ClaimHistoryQuery = z.infer<typeof ClaimHistoryQuerySchema>;

// =============================================================================
// Administration DTOs
// =============================================================================

export const LedgerNameSchema = z.enum(["allocation", "vesting", "token"]);

export type LedgerName = z.infer<typeof LedgerNameSchema>;

export const RoleChangeSchema = z.discriminatedUnion("ledger", [
  z.object({
    ledger: z.literal("allocation"),
    role: z.literal("admin"),
    account: AddressSchema,
  }),
  z.object({
    ledger: z.literal("vesting"),
    role: z.enum(["admin", "vesting_admin", "manual_unlock"]),
    account: AddressSchema,
  }),
  z.object({
    ledger: z.literal("token"),
    role: z.literal("minter"),
    account: AddressSchema,
  }),
]);

export type RoleChangeDto = z.infer<typeof RoleChangeSchema>;
