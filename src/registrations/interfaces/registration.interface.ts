import { RegistrationStatus } from '../enums/registration-status.enum';

export interface Registration {
  id: string;
  userId: string;
  eventId: string;
  status: RegistrationStatus;
  /** Ordering key, strictly increasing per event. Earliest is promoted first. */
  registeredAt: number;
  createdAt: string;
  updatedAt: string;
}

export interface CancellationResult {
  cancelled: Registration;
  promoted: Registration | null;
}
