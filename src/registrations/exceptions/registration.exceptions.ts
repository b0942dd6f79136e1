import {
  ConflictException,
  InternalServerErrorException,
} from '@nestjs/common';

export class DuplicateRegistrationException extends ConflictException {
  constructor() {
    super('User is already registered for this event');
  }
}

export class CapacityExceededException extends ConflictException {
  constructor() {
    super('Event has reached its capacity and has no waitlist');
  }
}

/**
 * Retry bound exhausted under contention. Safe for the caller to retry.
 */
export class TransientConflictException extends InternalServerErrorException {
  constructor(operation: string) {
    super(
      `Could not ${operation} due to concurrent updates, please retry`,
    );
  }
}

export class RegistrationStoreException extends InternalServerErrorException {}
