export enum CapacityDecision {
  CONFIRM = 'confirm',
  WAITLIST = 'waitlist',
  REJECT = 'reject',
}

/**
 * Outcome of a new registration attempt given the confirmed headcount at
 * read time. Pure, so the engine can call it again on every retry.
 */
export function decideCapacity(
  confirmedCount: number,
  capacity: number,
  hasWaitlist: boolean,
): CapacityDecision {
  if (confirmedCount < capacity) {
    return CapacityDecision.CONFIRM;
  }
  return hasWaitlist ? CapacityDecision.WAITLIST : CapacityDecision.REJECT;
}
