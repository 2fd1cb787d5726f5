/**
 * DICEPOOL - Engine Events
 *
 * Typed events for external indexers. Emitted only after the operation that
 * caused them has committed. The bus keeps a bounded history so the API can
 * serve `GET /events?after=<seq>` polling.
 */

import type { Address } from 'viem';

// ─── Event Types ──────────────────────────────────────────────────────────────

export interface BetPlacedEvent {
  type: 'bet_placed';
  data: {
    betId: bigint;
    owner: Address;
    amount: bigint;
    targetOdds: bigint;
    originBlock: bigint;
  };
}

export interface BetResolvedEvent {
  type: 'bet_resolved';
  data: {
    betId: bigint;
    won: boolean;
    payout: bigint;
  };
}

export interface BetClaimedEvent {
  type: 'bet_claimed';
  data: {
    betId: bigint;
    owner: Address;
    payout: bigint;
  };
}

export interface BetExpiredEvent {
  type: 'bet_expired';
  data: {
    betId: bigint;
  };
}

export interface HouseEdgeChangedEvent {
  type: 'house_edge_changed';
  data: {
    oldEdge: bigint;
    newEdge: bigint;
  };
}

export interface StakedEvent {
  type: 'staked';
  data: {
    account: Address;
    assets: bigint;
    shares: bigint;
  };
}

export interface UnstakedEvent {
  type: 'unstaked';
  data: {
    account: Address;
    assets: bigint;
    shares: bigint;
  };
}

/** Discriminated union of everything the engine announces. */
export type EngineEvent =
  | BetPlacedEvent
  | BetResolvedEvent
  | BetClaimedEvent
  | BetExpiredEvent
  | HouseEdgeChangedEvent
  | StakedEvent
  | UnstakedEvent;

export interface RecordedEvent {
  seq: number;
  timestamp: string;
  event: EngineEvent;
}

export type EventListener = (record: RecordedEvent) => void;

/** Wraps each listener call; the engine uses it to detach listeners from the emitting operation. */
export type ListenerRunner = (deliver: () => void) => void;

// ─── Bus ──────────────────────────────────────────────────────────────────────

const DEFAULT_HISTORY = 1000;

export class EventBus {
  private readonly listeners = new Set<EventListener>();
  private readonly history: RecordedEvent[] = [];
  private seq = 0;

  constructor(
    private readonly historyLimit: number = DEFAULT_HISTORY,
    private readonly runListener: ListenerRunner = (deliver) => deliver(),
  ) {}

  /**
   * Listeners run after the emitting operation has committed and outside its
   * lock context, so they may call back into the engine; such calls queue
   * behind the current operation.
   */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: EngineEvent): RecordedEvent {
    this.seq += 1;
    const record: RecordedEvent = {
      seq: this.seq,
      timestamp: new Date().toISOString(),
      event,
    };

    this.history.push(record);
    if (this.history.length > this.historyLimit) this.history.shift();

    // A broken listener must not undo a committed operation.
    for (const listener of this.listeners) {
      try {
        this.runListener(() => listener(record));
      } catch (err) {
        console.error(`[events] Listener failed on ${event.type}:`, err);
      }
    }
    return record;
  }

  /** Recorded events with seq > `after`, oldest first. */
  since(after: number = 0, limit: number = 100): RecordedEvent[] {
    return this.history.filter((r) => r.seq > after).slice(0, limit);
  }

  get lastSeq(): number {
    return this.seq;
  }
}
