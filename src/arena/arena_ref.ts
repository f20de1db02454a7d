/***
 * ArenaRef — Mutable view of one live arena entry.
 *
 * Returned by Arena.get_mut. Reading or assigning `value` goes straight
 * to the occupied slot, so primitives can be updated in place:
 *
 *   const hp = arena.get_mut(idx);
 *   if (hp) hp.value -= 10;
 *
 * The ref is bound to the occupancy it was created for. Once that entry
 * is removed, writes through the ref land on a detached slot and are not
 * visible through the arena.
 *
 ***/

import type { Index } from "../handle";
import type { OccupiedSlot } from "./slot";

export interface ArenaRef<T> {
  readonly index: Index;
  value: T;
}

export function create_arena_ref<T>(
  slot: OccupiedSlot<T>,
  index: Index,
): ArenaRef<T> {
  return {
    index,
    get value(): T {
      return slot.value;
    },
    set value(next: T) {
      slot.value = next;
    },
  };
}
