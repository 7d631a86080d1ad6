import { monotonicFactory } from "ulid";

/**
 * Monotonic within a process, so ids generated in the same millisecond
 * still sort in creation order.
 */
export const ulid = monotonicFactory();
