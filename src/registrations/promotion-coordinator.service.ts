import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RegistrationStatus } from './enums/registration-status.enum';
import {
  CancellationResult,
  Registration,
} from './interfaces/registration.interface';
import { RegistrationLedger } from './registration-ledger';
import { TransientConflictException } from './exceptions/registration.exceptions';
import { resolveMaxAttempts } from './registration.constants';

/**
 * Cancels a registration and hands reserved seats to the earliest
 * waitlisted registrations. No lock is held; double promotion is ruled out
 * by the compare-and-swap in `RegistrationLedger.promote`, and a reserved
 * seat cannot be taken by a newcomer in between.
 */
@Injectable()
export class PromotionCoordinator {
  private readonly logger = new Logger(PromotionCoordinator.name);
  private readonly maxAttempts: number;

  constructor(
    private readonly ledger: RegistrationLedger,
    private readonly configService: ConfigService,
  ) {
    this.maxAttempts = resolveMaxAttempts(this.configService);
  }

  async cancelAndMaybePromote(
    userId: string,
    eventId: string,
  ): Promise<CancellationResult> {
    const cancelled = await this.removeRegistration(userId, eventId);
    // A waitlisted cancel frees no seat, but still settles reservations a
    // crashed cancel left behind.
    const promoted = await this.promoteNext(eventId);
    return { cancelled, promoted };
  }

  private async removeRegistration(
    userId: string,
    eventId: string,
  ): Promise<Registration> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const result = await this.ledger.delete(userId, eventId);
      switch (result.outcome) {
        case 'deleted':
          this.logger.log(
            `Cancelled ${result.previous.status} registration of user ${userId} for event ${eventId}`,
          );
          return result.previous;
        case 'not-found':
          throw new NotFoundException('Registration not found');
        case 'conflict':
          this.logger.warn(
            `Registration of user ${userId} for event ${eventId} changed during cancel (attempt ${attempt})`,
          );
      }
    }

    this.logger.error(
      `Gave up cancelling registration of user ${userId} for event ${eventId} after ${this.maxAttempts} attempts`,
    );
    throw new TransientConflictException('cancel the registration');
  }

  /**
   * Settles every reserved seat of the event: each goes to the earliest
   * waitlisted registration, or is freed once no one is left waiting.
   * Returns the first registration promoted here, or null when there was
   * nothing to hand over or a concurrent cancel did it.
   */
  async promoteNext(eventId: string): Promise<Registration | null> {
    let promoted: Registration | null = null;
    let after: number | undefined;
    let misses = 0;

    while (misses < this.maxAttempts) {
      if ((await this.ledger.countPendingPromotions(eventId)) === 0) {
        return promoted;
      }

      const candidate = await this.ledger.firstWaitlisted(eventId, after);
      if (!candidate) {
        const release = await this.ledger.releaseReservation(eventId);
        if (release.outcome === 'released') {
          this.logger.log(`Freed a reserved seat of event ${eventId}`);
        } else {
          misses++;
          this.logger.warn(
            `Waitlist of event ${eventId} changed while freeing a reserved seat (attempt ${misses})`,
          );
        }
        after = undefined;
        continue;
      }

      const result = await this.ledger.promote(candidate);
      switch (result.outcome) {
        case 'promoted':
          this.logger.log(
            `Promoted user ${candidate.userId} from the waitlist of event ${eventId}`,
          );
          if (!promoted) {
            promoted = {
              ...candidate,
              status: RegistrationStatus.CONFIRMED,
              updatedAt: result.updatedAt,
            };
          }
          after = candidate.registeredAt;
          break;
        case 'not-found':
        case 'already-confirmed':
          // Someone else settled this candidate; move down the line.
          misses++;
          after = candidate.registeredAt;
          break;
        case 'no-reservation':
          misses++;
          this.logger.warn(
            `Reserved seat of event ${eventId} was handed over by a concurrent cancel`,
          );
          break;
        case 'conflict':
          misses++;
          this.logger.warn(
            `Promotion of user ${candidate.userId} on event ${eventId} raced (attempt ${misses})`,
          );
      }
    }

    this.logger.error(
      `Gave up promoting on event ${eventId} after ${this.maxAttempts} attempts`,
    );
    throw new TransientConflictException('promote from the waitlist');
  }
}
