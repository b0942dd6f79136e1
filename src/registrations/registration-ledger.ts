import { RegistrationStatus } from './enums/registration-status.enum';
import { Registration } from './interfaces/registration.interface';

export interface NewRegistration {
  userId: string;
  eventId: string;
  status: RegistrationStatus;
  orderingKey: number;
  /** Capacity the admission was decided against; the write is conditioned on it. */
  capacity: number;
}

export type CreateOutcome =
  | { outcome: 'created'; registration: Registration }
  | { outcome: 'already-exists' }
  | { outcome: 'conflict' };

export type DeleteOutcome =
  | { outcome: 'deleted'; previous: Registration }
  | { outcome: 'not-found' }
  | { outcome: 'conflict' };

export type PromoteOutcome =
  | { outcome: 'promoted'; updatedAt: string }
  | { outcome: 'not-found' }
  | { outcome: 'already-confirmed' }
  | { outcome: 'no-reservation' }
  | { outcome: 'conflict' };

export type ReleaseOutcome = { outcome: 'released' } | { outcome: 'conflict' };

/**
 * Sole writer of registration records. Every mutation is a conditional
 * write; races come back as `conflict` outcomes for the caller to retry,
 * only store failures throw.
 *
 * Seats are held per event. A confirmed registration holds one; a seat
 * given up while someone is waiting stays held as a reservation until a
 * waitlisted registration is promoted into it, so a newcomer can never take
 * it first.
 */
export abstract class RegistrationLedger {
  /** Next ordering key for the event. Keys only grow; gaps are allowed. */
  abstract allocateOrderingKey(eventId: string): Promise<number>;

  /**
   * Inserts a record if the (user, event) pair has none. A confirmed insert
   * also requires a free seat, a waitlisted one requires every seat to be
   * held; otherwise the outcome is `conflict`.
   */
  abstract tryCreate(registration: NewRegistration): Promise<CreateOutcome>;

  abstract get(userId: string, eventId: string): Promise<Registration | null>;

  /**
   * Removes the record. A confirmed record's seat becomes a reservation
   * when a waitlisted registration has no reservation yet, and is freed
   * otherwise.
   */
  abstract delete(userId: string, eventId: string): Promise<DeleteOutcome>;

  /** Seats held on the event, reservations included. */
  abstract countConfirmed(eventId: string): Promise<number>;

  abstract countPendingPromotions(eventId: string): Promise<number>;

  /** Earliest waitlisted record, optionally past a given ordering key. */
  abstract firstWaitlisted(
    eventId: string,
    after?: number,
  ): Promise<Registration | null>;

  /**
   * Compare-and-swap from waitlisted to confirmed, consuming a
   * reservation of the event.
   */
  abstract promote(registration: Registration): Promise<PromoteOutcome>;

  /**
   * Frees a reserved seat, provided the remaining reservations still
   * cover every waitlisted registration.
   */
  abstract releaseReservation(eventId: string): Promise<ReleaseOutcome>;

  abstract listForUser(
    userId: string,
    status?: RegistrationStatus,
  ): Promise<Registration[]>;

  /** Records of the event in ascending ordering-key order. */
  abstract listForEvent(
    eventId: string,
    status?: RegistrationStatus,
  ): Promise<Registration[]>;
}
