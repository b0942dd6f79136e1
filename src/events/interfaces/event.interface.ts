import { EventStatus } from '../enums/event-status.enum';

export interface Event {
  eventId: string;
  title: string;
  description: string;
  date: string;
  location: string;
  capacity: number;
  organizer: string;
  status: EventStatus;
  hasWaitlist?: boolean;
}

/**
 * The slice of an event the registration engine decides on.
 */
export interface EventCapacity {
  eventId: string;
  capacity: number;
  hasWaitlist: boolean;
}
