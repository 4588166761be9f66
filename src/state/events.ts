import { AcquisitionPolicy, EventDetail, PendingEvent, ProcessingRecord } from "../types";
import { isExhausted } from "./stateModel";

/** An `exhausted` event when a transition moves the record into the exhausted state. */
export function exhaustionEvents(
  before: ProcessingRecord,
  after: ProcessingRecord,
  policy: AcquisitionPolicy,
  detail: EventDetail,
): PendingEvent[] {
  if (isExhausted(before, policy) || !isExhausted(after, policy)) {
    return [];
  }
  return [
    {
      eventType: "exhausted",
      detail: {
        ...detail,
        retryCount: after.retryCount,
        maxRetries: policy.maxRetries,
        reason: after.retryCount >= policy.maxRetries ? "retry-ceiling" : "sources-exhausted",
      },
    },
  ];
}
