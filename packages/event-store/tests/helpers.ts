import type { DomainEvent } from "@shareport/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: DomainEvent["payload"] = {},
  source: DomainEvent["metadata"]["source"] = "vault",
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      height: "1",
      actor: "0x0000000000000000000000000000000000000001",
      correlationId: `corr-${counter}`,
      source,
    },
    payload,
  };
}
