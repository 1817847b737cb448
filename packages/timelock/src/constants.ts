/** Seconds in one day. */
const DAY = 86_400n;

/** Window after eta during which a queued action may still execute. */
export const GRACE_PERIOD = 14n * DAY;

/** Inclusive lower bound on the timelock delay. */
export const MINIMUM_DELAY = 2n * DAY;

/** Inclusive upper bound on the timelock delay. */
export const MAXIMUM_DELAY = 30n * DAY;
