import { ConfigService } from '@nestjs/config';

export const DEFAULT_MAX_ATTEMPTS = 5;

export const REGISTRATIONS_BY_EVENT_INDEX = 'eventId-registeredAt-index';

// Sort keys of the tallies table. The tally sorts before every waitlist
// entry, and zero-padded ordering keys sort numerically.
export const TALLY_ENTRY = 'TALLY';
export const WAITLIST_ENTRY_PREFIX = 'W#';

export function waitlistEntry(orderingKey: number): string {
  return `${WAITLIST_ENTRY_PREFIX}${String(orderingKey).padStart(16, '0')}`;
}

export function resolveMaxAttempts(configService: ConfigService): number {
  const configured = Number(
    configService.get<string>('REGISTRATION_MAX_ATTEMPTS'),
  );
  return Number.isInteger(configured) && configured > 0
    ? configured
    : DEFAULT_MAX_ATTEMPTS;
}
