import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventsService } from '../events/events.service';
import { UsersService } from '../users/users.service';
import { RegistrationStatus } from './enums/registration-status.enum';
import {
  CancellationResult,
  Registration,
} from './interfaces/registration.interface';
import { RegistrationLedger } from './registration-ledger';
import { PromotionCoordinator } from './promotion-coordinator.service';
import { CapacityDecision, decideCapacity } from './capacity-policy';
import {
  CapacityExceededException,
  DuplicateRegistrationException,
  TransientConflictException,
} from './exceptions/registration.exceptions';
import { resolveMaxAttempts } from './registration.constants';

@Injectable()
export class RegistrationsService {
  private readonly logger = new Logger(RegistrationsService.name);
  private readonly maxAttempts: number;

  constructor(
    private readonly ledger: RegistrationLedger,
    private readonly promotionCoordinator: PromotionCoordinator,
    private readonly eventsService: EventsService,
    private readonly usersService: UsersService,
    private readonly configService: ConfigService,
  ) {
    this.maxAttempts = resolveMaxAttempts(this.configService);
  }

  /**
   * Admits the user as confirmed or waitlisted. The headcount read is only
   * advisory: the ledger re-checks capacity in the same conditional write,
   * and a lost race sends us around again with a fresh count.
   */
  async register(userId: string, eventId: string): Promise<Registration> {
    if (!(await this.usersService.userExists(userId))) {
      throw new NotFoundException('User not found');
    }

    let event = await this.eventsService.findEventCapacity(eventId);
    if (!event) {
      throw new NotFoundException('Event not found');
    }

    if (await this.ledger.get(userId, eventId)) {
      throw new DuplicateRegistrationException();
    }

    // Taken once so that retries keep their place in line.
    const orderingKey = await this.ledger.allocateOrderingKey(eventId);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (attempt > 1) {
        event = await this.eventsService.findEventCapacity(eventId);
        if (!event) {
          throw new NotFoundException('Event not found');
        }
      }

      const confirmedCount = await this.ledger.countConfirmed(eventId);
      const decision = decideCapacity(
        confirmedCount,
        event.capacity,
        event.hasWaitlist,
      );
      if (decision === CapacityDecision.REJECT) {
        this.logger.log(
          `Rejected user ${userId} for event ${eventId}: ${confirmedCount}/${event.capacity} seats taken`,
        );
        throw new CapacityExceededException();
      }

      const status =
        decision === CapacityDecision.CONFIRM
          ? RegistrationStatus.CONFIRMED
          : RegistrationStatus.WAITLISTED;
      const result = await this.ledger.tryCreate({
        userId,
        eventId,
        status,
        orderingKey,
        capacity: event.capacity,
      });

      switch (result.outcome) {
        case 'created':
          this.logger.log(
            `User ${userId} registered for event ${eventId} as ${status}`,
          );
          return result.registration;
        case 'already-exists':
          throw new DuplicateRegistrationException();
        case 'conflict':
          this.logger.warn(
            `Capacity of event ${eventId} shifted while registering user ${userId} (attempt ${attempt})`,
          );
      }
    }

    this.logger.error(
      `Gave up registering user ${userId} for event ${eventId} after ${this.maxAttempts} attempts`,
    );
    throw new TransientConflictException('complete the registration');
  }

  async cancel(userId: string, eventId: string): Promise<CancellationResult> {
    return this.promotionCoordinator.cancelAndMaybePromote(userId, eventId);
  }

  async listForUser(
    userId: string,
    status?: RegistrationStatus,
  ): Promise<Registration[]> {
    if (!(await this.usersService.userExists(userId))) {
      throw new NotFoundException('User not found');
    }
    return this.ledger.listForUser(userId, status);
  }

  async listForEvent(
    eventId: string,
    status?: RegistrationStatus,
  ): Promise<Registration[]> {
    if (!(await this.eventsService.findEventById(eventId))) {
      throw new NotFoundException('Event not found');
    }
    return this.ledger.listForEvent(eventId, status);
  }
}
