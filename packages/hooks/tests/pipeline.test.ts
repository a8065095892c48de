/**
 * Tests for HookPipeline — ordering, removal safety, reorder validation.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Environment } from "@shareport/runtime";
import { HookPipeline } from "../src/pipeline.js";
import { HookError, HookCheckFailedError } from "../src/errors.js";
import { ADMIN, VAULT, RecordingHook, depositContext } from "./helpers.js";

describe("HookPipeline", () => {
  let env: Environment;
  let pipeline: HookPipeline;
  let log: string[];

  beforeEach(() => {
    env = new Environment({ chainId: 1 });
    pipeline = new HookPipeline(env, VAULT);
    log = [];
  });

  // ─── runAll ──────────────────────────────────────────────────────────

  describe("runAll", () => {
    it("approves an empty pipeline", () => {
      expect(pipeline.runAll({ tag: "deposit", context: depositContext() })).toEqual({
        approved: true,
      });
    });

    it("runs hooks in order and stops at the first rejection", () => {
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("a", log));
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("b", log, "b says no"));
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("c", log, "c says no"));

      const result = pipeline.runAll({ tag: "deposit", context: depositContext() });

      expect(result).toEqual({ approved: false, reason: "b says no" });
      expect(log).toEqual(["a", "b"]);
    });

    it("only consults hooks of the invoked tag", () => {
      pipeline.addHook(ADMIN, "transfer", new RecordingHook("t", log, "blocked"));
      expect(pipeline.runAll({ tag: "deposit", context: depositContext() }).approved).toBe(true);
      expect(log).toEqual([]);
    });

    it("assertAll surfaces the reason verbatim", () => {
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("kyc", log, "receiver not verified"));

      let caught: unknown;
      try {
        pipeline.assertAll({ tag: "deposit", context: depositContext() });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(HookCheckFailedError);
      expect(caught).toMatchObject({
        code: "HOOK_CHECK_FAILED",
        category: "hook",
        reason: "receiver not verified",
        tag: "deposit",
      });
    });
  });

  // ─── addHook ─────────────────────────────────────────────────────────

  describe("addHook", () => {
    it("rejects a missing hook", () => {
      expect(() => pipeline.addHook(ADMIN, "deposit", null)).toThrow(HookError);
    });

    it("stamps entries with increasing sequence values and accepts duplicates", () => {
      const hook = new RecordingHook("dup", log);
      const first = pipeline.addHook(ADMIN, "deposit", hook);
      const second = pipeline.addHook(ADMIN, "deposit", hook);

      expect(second.registeredAtSequence).toBeGreaterThan(first.registeredAtSequence);
      expect(pipeline.listHooks("deposit")).toHaveLength(2);
    });

    it("emits a hook-added event", () => {
      pipeline.addHook(ADMIN, "withdraw", new RecordingHook("w", log));
      const [event] = env.events.read(`hooks:${VAULT}`);

      expect(event?.event.type).toBe("hooks.hook.added");
      expect(event?.event.payload).toEqual({
        tag: "withdraw",
        index: 0,
        hookName: "w",
        registeredAtSequence: 1,
      });
    });
  });

  // ─── removeHook ──────────────────────────────────────────────────────

  describe("removeHook", () => {
    it("rejects an out-of-bounds index", () => {
      expect(() => pipeline.removeHook(ADMIN, "deposit", 0)).toThrow(
        "Hook index 0 is out of bounds for deposit (0 hooks)",
      );
    });

    it("swaps the last hook into the removed slot", () => {
      for (const name of ["a", "b", "c", "d"]) {
        pipeline.addHook(ADMIN, "deposit", new RecordingHook(name, log));
      }

      pipeline.removeHook(ADMIN, "deposit", 1);

      expect(pipeline.listHooks("deposit").map((e) => e.hook.name)).toEqual(["a", "d", "c"]);
    });

    it("removes the last hook without disturbing the others", () => {
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("a", log));
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("b", log));

      pipeline.removeHook(ADMIN, "deposit", 1);

      expect(pipeline.listHooks("deposit").map((e) => e.hook.name)).toEqual(["a"]);
    });

    it("refuses to remove a hook that gated a completed operation", () => {
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("gate", log));
      pipeline.markExecuted("deposit");

      expect(() => pipeline.removeHook(ADMIN, "deposit", 0)).toThrow(
        'Hook "gate" at deposit[0] has already gated a completed deposit',
      );
    });

    it("allows removing a hook added after the last completed operation", () => {
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("old", log));
      pipeline.markExecuted("deposit");
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("new", log));

      const removed = pipeline.removeHook(ADMIN, "deposit", 1);

      expect(removed.hook.name).toBe("new");
      expect(pipeline.describeHooks("deposit").map((v) => v.removable)).toEqual([false]);
    });

    it("tracks watermarks per tag", () => {
      pipeline.addHook(ADMIN, "deposit", new RecordingHook("d", log));
      pipeline.markExecuted("withdraw");

      expect(pipeline.lastExecutedSequence("deposit")).toBe(0);
      expect(() => pipeline.removeHook(ADMIN, "deposit", 0)).not.toThrow();
    });
  });

  // ─── reorder ─────────────────────────────────────────────────────────

  describe("reorder", () => {
    beforeEach(() => {
      for (const name of ["a", "b", "c"]) {
        pipeline.addHook(ADMIN, "deposit", new RecordingHook(name, log));
      }
    });

    it("applies a permutation", () => {
      pipeline.reorder(ADMIN, "deposit", [2, 0, 1]);
      expect(pipeline.listHooks("deposit").map((e) => e.hook.name)).toEqual(["c", "a", "b"]);
    });

    it("rejects the wrong length", () => {
      expect(() => pipeline.reorder(ADMIN, "deposit", [0, 1])).toThrow(
        "Reorder of deposit needs 3 indices, got 2",
      );
    });

    it("rejects an out-of-bounds index", () => {
      expect(() => pipeline.reorder(ADMIN, "deposit", [0, 1, 3])).toThrow(/out of bounds/);
    });

    it("rejects duplicate indices and leaves the order untouched", () => {
      expect(() => pipeline.reorder(ADMIN, "deposit", [0, 0, 1])).toThrow(
        "Hook index 0 appears twice in reorder of deposit",
      );
      expect(pipeline.listHooks("deposit").map((e) => e.hook.name)).toEqual(["a", "b", "c"]);
    });
  });

  // ─── atomicity ───────────────────────────────────────────────────────

  it("rolls back watermark changes of a failed operation", () => {
    pipeline.addHook(ADMIN, "deposit", new RecordingHook("a", log));

    expect(() =>
      env.atomic(() => {
        pipeline.markExecuted("deposit");
        throw new Error("operation failed after hooks");
      }),
    ).toThrow("operation failed after hooks");

    expect(pipeline.lastExecutedSequence("deposit")).toBe(0);
    expect(() => pipeline.removeHook(ADMIN, "deposit", 0)).not.toThrow();
  });
});
