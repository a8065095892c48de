/**
 * HookPipeline — ordered, mutable, safety-constrained hook lists.
 *
 * One ordered list of hooks per operation tag, plus a per-tag watermark
 * holding the sequence value of the last completed operation of that tag.
 *
 * Rules:
 * - Hooks run strictly in list order; the first rejection wins
 * - Duplicate hook references are accepted
 * - A hook cannot be removed once an operation of its tag has completed
 *   after it was added: the filter set that governed a historical
 *   operation can never be altered retroactively
 * - Removal is swap-with-last and truncate, so it changes order
 */

import type { Address, OperationTag } from "@shareport/types";
import { OPERATION_TAGS } from "@shareport/types";
import { SHAREPORT_EVENTS } from "@shareport/event-store";
import type { Checkpointable, Environment } from "@shareport/runtime";
import type {
  HookEntry,
  HookEntryView,
  HookInvocation,
  HookResult,
  OperationHook,
} from "./types.js";
import { evaluateHooks } from "./evaluate.js";
import { HookCheckFailedError, HookError } from "./errors.js";

interface PipelineState {
  readonly lists: ReadonlyMap<OperationTag, readonly HookEntry[]>;
  readonly watermarks: ReadonlyMap<OperationTag, number>;
}

export class HookPipeline implements Checkpointable<PipelineState> {
  private readonly env: Environment;
  private readonly streamId: string;
  private _lists = new Map<OperationTag, HookEntry[]>();
  private _watermarks = new Map<OperationTag, number>();

  /**
   * @param owner Address of the component the pipeline guards (the vault)
   */
  constructor(env: Environment, owner: Address) {
    this.env = env;
    this.streamId = `hooks:${owner}`;
    for (const tag of OPERATION_TAGS) {
      this._lists.set(tag, []);
      this._watermarks.set(tag, 0);
    }
    env.register(this);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutation
  // ───────────────────────────────────────────────────────────────────────

  addHook(actor: Address, tag: OperationTag, hook: OperationHook | null | undefined): HookEntry {
    if (hook === null || hook === undefined) {
      throw new HookError("INVALID_HOOK", `Cannot add a missing hook to ${tag}`);
    }

    return this.env.atomic(() => {
      const entry: HookEntry = { hook, registeredAtSequence: this.env.nextSequence() };
      const list = this.list(tag);
      list.push(entry);

      this.env.emit(this.streamId, SHAREPORT_EVENTS.HOOK_ADDED, "hooks", actor, {
        tag,
        index: list.length - 1,
        hookName: hook.name,
        registeredAtSequence: entry.registeredAtSequence,
      });
      return entry;
    });
  }

  removeHook(actor: Address, tag: OperationTag, index: number): HookEntry {
    const list = this.list(tag);
    const entry = list[index];
    if (!Number.isInteger(index) || entry === undefined) {
      throw new HookError(
        "INDEX_OUT_OF_BOUNDS",
        `Hook index ${index} is out of bounds for ${tag} (${list.length} hooks)`,
      );
    }
    if (!this.isRemovable(tag, entry)) {
      throw new HookError(
        "HOOK_HAS_PROCESSED_OPERATIONS",
        `Hook "${entry.hook.name}" at ${tag}[${index}] has already gated a completed ${tag}`,
      );
    }

    return this.env.atomic(() => {
      const last = list.pop();
      if (last !== undefined && index < list.length) {
        list[index] = last;
      }

      this.env.emit(this.streamId, SHAREPORT_EVENTS.HOOK_REMOVED, "hooks", actor, {
        tag,
        index,
        hookName: entry.hook.name,
      });
      return entry;
    });
  }

  /**
   * Permute the hooks of `tag`. `newOrder[i]` is the old index of the hook
   * that ends up at position i.
   */
  reorder(actor: Address, tag: OperationTag, newOrder: readonly number[]): void {
    const list = this.list(tag);
    if (newOrder.length !== list.length) {
      throw new HookError(
        "INVALID_REORDER_LENGTH",
        `Reorder of ${tag} needs ${list.length} indices, got ${newOrder.length}`,
      );
    }

    const seen = new Set<number>();
    const reordered: HookEntry[] = [];
    for (const oldIndex of newOrder) {
      const entry = list[oldIndex];
      if (!Number.isInteger(oldIndex) || entry === undefined) {
        throw new HookError(
          "INDEX_OUT_OF_BOUNDS",
          `Hook index ${oldIndex} is out of bounds for ${tag} (${list.length} hooks)`,
        );
      }
      if (seen.has(oldIndex)) {
        throw new HookError("DUPLICATE_INDEX", `Hook index ${oldIndex} appears twice in reorder of ${tag}`);
      }
      seen.add(oldIndex);
      reordered.push(entry);
    }

    this.env.atomic(() => {
      this._lists.set(tag, reordered);
      this.env.emit(this.streamId, SHAREPORT_EVENTS.HOOKS_REORDERED, "hooks", actor, {
        tag,
        newOrder: [...newOrder],
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Evaluation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Evaluate every hook of the invocation's tag, in order.
   */
  runAll(invocation: HookInvocation): HookResult {
    return evaluateHooks(
      this.list(invocation.tag).map((entry) => entry.hook),
      invocation,
    );
  }

  /**
   * Like runAll, but throws HookCheckFailedError on rejection.
   */
  assertAll(invocation: HookInvocation): void {
    const result = this.runAll(invocation);
    if (!result.approved) {
      throw new HookCheckFailedError(invocation.tag, result.reason);
    }
  }

  /**
   * Record that an operation of `tag` completed successfully.
   */
  markExecuted(tag: OperationTag): number {
    const sequence = this.env.nextSequence();
    this._watermarks.set(tag, sequence);
    return sequence;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  listHooks(tag: OperationTag): readonly HookEntry[] {
    return [...this.list(tag)];
  }

  describeHooks(tag: OperationTag): readonly HookEntryView[] {
    return this.list(tag).map((entry, index) => ({
      tag,
      index,
      name: entry.hook.name,
      registeredAtSequence: entry.registeredAtSequence,
      removable: this.isRemovable(tag, entry),
    }));
  }

  lastExecutedSequence(tag: OperationTag): number {
    return this._watermarks.get(tag) ?? 0;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checkpointable
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): PipelineState {
    return {
      lists: new Map([...this._lists].map(([tag, list]) => [tag, [...list]])),
      watermarks: new Map(this._watermarks),
    };
  }

  restore(state: PipelineState): void {
    this._lists = new Map([...state.lists].map(([tag, list]) => [tag, [...list]]));
    this._watermarks = new Map(state.watermarks);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private list(tag: OperationTag): HookEntry[] {
    let list = this._lists.get(tag);
    if (list === undefined) {
      list = [];
      this._lists.set(tag, list);
    }
    return list;
  }

  private isRemovable(tag: OperationTag, entry: HookEntry): boolean {
    return this.lastExecutedSequence(tag) < entry.registeredAtSequence;
  }
}
