/**
 * Hand-built ledger events for journal tests.
 */

import type { LedgerEvent, LedgerEventSource } from "@vestline/types";

export const ALICE = "0x00000000000000000000000000000000000a11ce";
export const ADMIN = "0x00000000000000000000000000000000000ad000";

let counter = 0;

function metadata(source: LedgerEventSource, correlationId: string, actor = ADMIN) {
  counter += 1;
  return {
    eventId: `evt-${counter}`,
    timestamp: "2030-03-17T17:46:40.000Z",
    actor,
    correlationId,
    source,
  };
}

export function allocationCreated(id: number, correlationId = "corr-a"): LedgerEvent {
  return {
    type: "allocation.created",
    metadata: metadata("allocation", correlationId),
    payload: { allocationId: id, beneficiary: ALICE, amount: "1000", airdropId: 0 },
  };
}

export function tokensReleased(amount: string, correlationId = "corr-v"): LedgerEvent {
  return {
    type: "vesting.tokens_released",
    metadata: metadata("vesting", correlationId, ALICE),
    payload: {
      scheduleId: 1,
      beneficiary: ALICE,
      amount,
      releasedAmount: amount,
      completed: false,
    },
  };
}

export function tokenMinted(amount: string, correlationId = "corr-t"): LedgerEvent {
  return {
    type: "token.minted",
    metadata: metadata("token", correlationId),
    payload: { to: ALICE, amount, totalSupply: amount },
  };
}
