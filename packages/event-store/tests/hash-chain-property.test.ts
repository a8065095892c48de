/**
 * Property tests for the hash chain over Shareport event streams.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@shareport/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";
import { SHAREPORT_EVENTS } from "../src/shareport-events.js";
import { makeEvent } from "./helpers.js";

const arbAmount = fc.bigInt({ min: 0n, max: 10n ** 30n }).map((value) => value.toString());

const arbEvent: fc.Arbitrary<DomainEvent> = fc
  .record({
    type: fc.constantFrom(...Object.values(SHAREPORT_EVENTS)),
    assets: arbAmount,
    shares: arbAmount,
    round: fc.nat({ max: 1_000 }),
  })
  .map(({ type, assets, shares, round }) => makeEvent(type, { assets, shares, round }));

const arbStream = fc.constantFrom(
  "vault:0x0000000000000000000000000000000000000010",
  "escrow:0x0000000000000000000000000000000000000011",
  "oracle:0x0000000000000000000000000000000000000015",
);

describe("hash chain properties", () => {
  it("any sequence of appends verifies", () => {
    fc.assert(
      fc.property(fc.array(fc.tuple(arbStream, arbEvent), { minLength: 1, maxLength: 20 }), (appends) => {
        const store = new InMemoryEventStore();
        for (const [streamId, event] of appends) {
          store.append(streamId, [event]);
        }

        const result = store.verifyIntegrity();
        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(appends.length);
      }),
      { numRuns: 50 },
    );
  });

  it("dropping an interior event breaks the chain", () => {
    fc.assert(
      fc.property(fc.array(arbEvent, { minLength: 3, maxLength: 10 }), fc.nat(), (events, pick) => {
        const store = new InMemoryEventStore();
        store.append("vault:0x0000000000000000000000000000000000000010", events);

        const all = store.readAll();
        const index = 1 + (pick % (all.length - 2));
        const tampered = [...all.slice(0, index), ...all.slice(index + 1)];

        expect(verifyHashChain(tampered).valid).toBe(false);
      }),
      { numRuns: 30 },
    );
  });

  it("rewriting an amount in any payload breaks the chain", () => {
    fc.assert(
      fc.property(fc.array(arbEvent, { minLength: 2, maxLength: 8 }), fc.nat(), (events, pick) => {
        const store = new InMemoryEventStore();
        store.append("escrow:0x0000000000000000000000000000000000000011", events);

        const tampered = store.readAll().map((stored, index, all) =>
          index === pick % all.length
            ? {
                ...stored,
                event: {
                  ...stored.event,
                  payload: { ...stored.event.payload, assets: `${stored.event.payload["assets"]}1` },
                },
              }
            : stored,
        );

        expect(verifyHashChain(tampered).valid).toBe(false);
      }),
      { numRuns: 30 },
    );
  });

  it("verification does not change the result", () => {
    fc.assert(
      fc.property(fc.array(arbEvent, { minLength: 1, maxLength: 10 }), (events) => {
        const store = new InMemoryEventStore();
        store.append("oracle:0x0000000000000000000000000000000000000015", events);

        const first = store.verifyIntegrity();
        const second = store.verifyIntegrity();
        expect(second).toEqual(first);
      }),
      { numRuns: 30 },
    );
  });
});
