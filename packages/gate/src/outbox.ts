/**
 * @vestline/gate — Event outbox.
 *
 * Stages the events of one operation and hands them to the sink only
 * when the operation returns. A throwing operation publishes nothing,
 * so subscribers never see events for state that was not committed.
 */

import { randomUUID } from "node:crypto";
import type {
  Address,
  Clock,
  EventSink,
  LedgerEvent,
  LedgerEventDraft,
  LedgerEventSource,
} from "@vestline/types";

export type Emit = (draft: LedgerEventDraft) => void;

export class EventOutbox {
  private readonly source: LedgerEventSource;
  private readonly clock: Clock;
  private readonly sink: EventSink | undefined;

  constructor(source: LedgerEventSource, clock: Clock, sink?: EventSink) {
    this.source = source;
    this.clock = clock;
    this.sink = sink;
  }

  /**
   * Run `operation` with an `emit` callback. Every event it emits shares
   * one correlation id and is published after it returns.
   */
  transaction<T>(actor: Address, operation: (emit: Emit) => T): T {
    const correlationId = randomUUID();
    const timestamp = new Date(this.clock.now() * 1000).toISOString();
    const staged: LedgerEvent[] = [];

    const emit: Emit = (draft) => {
      staged.push({
        ...draft,
        metadata: {
          eventId: randomUUID(),
          timestamp,
          actor,
          correlationId,
          source: this.source,
        },
      });
    };

    const result = operation(emit);

    if (this.sink !== undefined) {
      for (const event of staged) {
        this.sink.publish(event);
      }
    }
    return result;
  }
}
