export enum EventStatus {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  PUBLISHED = 'PUBLISHED',
  RETRYING = 'RETRYING',
  FAILED = 'FAILED',
}

/**
 * Allowed forward moves of an outbox record:
 * PENDING -> PROCESSING -> PUBLISHED | RETRYING | FAILED, RETRYING -> PROCESSING.
 */
export const EVENT_STATUS_TRANSITIONS: Readonly<Record<EventStatus, readonly EventStatus[]>> = {
  [EventStatus.PENDING]: [EventStatus.PROCESSING],
  [EventStatus.PROCESSING]: [EventStatus.PUBLISHED, EventStatus.RETRYING, EventStatus.FAILED],
  [EventStatus.RETRYING]: [EventStatus.PROCESSING],
  [EventStatus.PUBLISHED]: [],
  [EventStatus.FAILED]: [],
};

export const canTransition = (from: EventStatus, to: EventStatus): boolean =>
  EVENT_STATUS_TRANSITIONS[from].includes(to);

/** Statuses a record may be in for a move to `to` to be legal. */
export const sourcesOf = (to: EventStatus): EventStatus[] =>
  Object.values(EventStatus).filter((from) => canTransition(from, to));

export const isTerminal = (status: EventStatus): boolean => {
  switch (status) {
    case EventStatus.PUBLISHED:
    case EventStatus.FAILED:
      return true;
    case EventStatus.PENDING:
    case EventStatus.PROCESSING:
    case EventStatus.RETRYING:
      return false;
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown event status: ${String(unreachable)}`);
    }
  }
};
