/***
 * Slot — Tagged state of one position in an arena's backing sequence.
 *
 *   OCCUPIED  holds a value and the generation it was inserted under
 *   FREE      holds the generation the next occupant will receive and a
 *             link to the next free slot (or FREE_LIST_END)
 *   RETIRED   generation exhausted; holds nothing and is never relinked
 *
 * Slot objects are replaced, never mutated across states, so a reference
 * to an OccupiedSlot taken before a remove no longer reaches the arena.
 *
 ***/

export enum SLOT_STATE {
  OCCUPIED = "OCCUPIED",
  FREE = "FREE",
  RETIRED = "RETIRED",
}

export interface OccupiedSlot<T> {
  readonly state: SLOT_STATE.OCCUPIED;
  readonly generation: number;
  value: T;
}

export interface FreeSlot {
  readonly state: SLOT_STATE.FREE;
  readonly generation: number;
  readonly next_free: number;
}

export interface RetiredSlot {
  readonly state: SLOT_STATE.RETIRED;
  readonly generation: number;
}

export type Slot<T> = OccupiedSlot<T> | FreeSlot | RetiredSlot;

export const occupied_slot = <T>(
  value: T,
  generation: number,
): OccupiedSlot<T> => ({ state: SLOT_STATE.OCCUPIED, generation, value });

export const free_slot = (generation: number, next_free: number): FreeSlot => ({
  state: SLOT_STATE.FREE,
  generation,
  next_free,
});

export const retired_slot = (generation: number): RetiredSlot => ({
  state: SLOT_STATE.RETIRED,
  generation,
});
