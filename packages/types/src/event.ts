/**
 * Event Types
 *
 * Every state change in the allocation ledger, the vesting engine and the
 * token ledger is published as a LedgerEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Payloads are JSON-safe: amounts are decimal strings, ids are numbers
 * - Events of one operation share a correlationId
 * - Events are published only when the operation commits
 */

/**
 * Which ledger emitted the event.
 */
export type LedgerEventSource = "allocation" | "vesting" | "token";

/**
 * Metadata common to all ledger events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp, taken from the ledger's clock */
  readonly timestamp: string;

  /** Address that called the operation */
  readonly actor: string;

  /** Shared by every event of the same operation */
  readonly correlationId: string;

  readonly source: LedgerEventSource;
}

/**
 * Payload shape for each event type.
 */
export interface LedgerEventPayloads {
  "allocation.created": {
    readonly allocationId: number;
    readonly beneficiary: string;
    readonly amount: string;
    readonly airdropId: number;
  };
  "allocation.revoked": {
    readonly allocationId: number;
    readonly beneficiary: string;
    readonly remainingAmount: string;
  };
  "allocation.reduced": {
    readonly allocationId: number;
    readonly amount: string;
    readonly remainingAmount: string;
  };
  "airdrop.executed": {
    readonly airdropId: number;
    readonly recipientCount: number;
    readonly totalAmount: string;
    readonly allocationIds: readonly number[];
  };
  "manager.assigned": { readonly account: string };
  "manager.removed": { readonly account: string };
  "role.granted": { readonly role: string; readonly account: string };
  "role.revoked": { readonly role: string; readonly account: string };
  "ledger.paused": { readonly ledger: LedgerEventSource };
  "ledger.unpaused": { readonly ledger: LedgerEventSource };
  "vesting.schedule_created": {
    readonly scheduleId: number;
    readonly beneficiary: string;
    readonly totalAmount: string;
    readonly startTime: number;
    readonly cliffDuration: number;
    readonly duration: number;
    readonly allocationId: number;
  };
  "vesting.tokens_released": {
    readonly scheduleId: number;
    readonly beneficiary: string;
    readonly amount: string;
    readonly releasedAmount: string;
    readonly completed: boolean;
  };
  "vesting.manual_unlock": {
    readonly scheduleId: number;
    readonly beneficiary: string;
    readonly amount: string;
    readonly releasedAmount: string;
    readonly completed: boolean;
  };
  "vesting.schedule_revoked": {
    readonly scheduleId: number;
    readonly beneficiary: string;
    readonly unvestedAmount: string;
    readonly forced: boolean;
  };
  "vesting.totals_updated": {
    readonly totalVested: string;
    readonly totalClaimed: string;
  };
  "vesting.allocation_sync_failed": {
    readonly scheduleId: number;
    readonly allocationId: number;
    readonly amount: string;
    readonly code: string;
    readonly reason: string;
  };
  "token.minted": {
    readonly to: string;
    readonly amount: string;
    readonly totalSupply: string;
  };
  "token.burned": {
    readonly from: string;
    readonly amount: string;
    readonly totalSupply: string;
  };
  "token.transferred": {
    readonly from: string;
    readonly to: string;
    readonly amount: string;
  };
}

export type LedgerEventType = keyof LedgerEventPayloads;

/**
 * A ledger event, discriminated by `type`.
 */
export type LedgerEvent = {
  readonly [K in LedgerEventType]: {
    readonly type: K;
    readonly metadata: EventMetadata;
    readonly payload: LedgerEventPayloads[K];
  };
}[LedgerEventType];

/**
 * A ledger event before metadata is attached.
 */
export type LedgerEventDraft = {
  readonly [K in LedgerEventType]: {
    readonly type: K;
    readonly payload: LedgerEventPayloads[K];
  };
}[LedgerEventType];

/**
 * Receiver of committed ledger events.
 */
export interface EventSink {
  publish(event: LedgerEvent): void;
}
