/***
 *
 * Arena — Generational array with an embedded free-list.
 *
 * Values live in a growable sequence of tagged slots. Removing a value
 * turns its slot FREE, bumps the slot generation and pushes the slot on
 * the head of a singly linked free-list threaded through the FREE slots
 * themselves. The next insert pops that head and reuses the position
 * under the new generation, so every Index issued for the previous
 * occupant stops resolving.
 *
 * Generation policy:
 *   - slots are born at INITIAL_GENERATION (1)
 *   - every OCCUPIED → FREE transition increments the generation by 1
 *   - a slot whose generation has reached max_generation is RETIRED on
 *     remove instead of freed, and is never handed out again
 *
 * Lookups with an out-of-range, vacant or stale Index are not errors:
 * get / get_mut / remove return undefined and change nothing.
 *
 * Iteration order is slot order. Structural changes (insert, remove,
 * clear, reserve) while an iterator is live are undefined behavior; dev
 * builds detect them and throw CONCURRENT_MODIFICATION. Updating values
 * through set or get_mut while iterating is fine.
 *
 * Usage:
 *
 *   const meshes = new Arena<Mesh>();
 *   const a = meshes.insert(cube);
 *   meshes.get(a);     // cube
 *   meshes.remove(a);  // cube
 *   meshes.get(a);     // undefined, even after the slot is reused
 *
 ***/

import {
  is_integer_in_range,
  is_non_negative_integer,
  validate_and_cast,
} from "type_primitives";
import { create_index, type Index } from "../handle";
import { ARENA_ERROR, ArenaError } from "../utils/error";
import {
  DEFAULT_INITIAL_CAPACITY,
  FREE_LIST_END,
  INITIAL_GENERATION,
  MAX_GENERATION,
} from "../utils/constants";
import {
  SLOT_STATE,
  free_slot,
  occupied_slot,
  retired_slot,
  type OccupiedSlot,
  type Slot,
} from "./slot";
import { create_arena_ref, type ArenaRef } from "./arena_ref";

export interface ArenaOptions {
  /** Free slots to reserve up front. Default 0. */
  initial_capacity?: number;
  /**
   * Highest generation a slot may reach before it is retired.
   * Default MAX_GENERATION (0xFFFFFFFF).
   */
  max_generation?: number;
}

export class Arena<T> {
  private slots: Slot<T>[] = [];
  private free_head = FREE_LIST_END;
  private live_count = 0;
  private retired = 0;
  private readonly max_generation: number;
  // Bumped on every structural change; iterators compare against it in dev.
  private version = 0;

  constructor(options: ArenaOptions = {}) {
    this.max_generation = validate_and_cast(
      options.max_generation ?? MAX_GENERATION,
      (v) => is_integer_in_range(v, INITIAL_GENERATION, MAX_GENERATION),
      "max_generation must be an integer in 1..0xFFFFFFFF",
    );
    this.reserve(options.initial_capacity ?? DEFAULT_INITIAL_CAPACITY);
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of live entries. */
  public get len(): number {
    return this.live_count;
  }

  public is_empty(): boolean {
    return this.live_count === 0;
  }

  /** Slots in the backing sequence: occupied, free and retired. */
  public get capacity(): number {
    return this.slots.length;
  }

  /** Slots permanently taken out of circulation by generation exhaustion. */
  public get retired_count(): number {
    return this.retired;
  }

  /**
   * Look up the value for an Index.
   *
   * Returns undefined when the slot is out of range, not occupied, or
   * occupied under a different generation. Because a stored value may
   * itself be undefined, use contains() to test liveness.
   */
  public get(index: Index): T | undefined {
    return this.live_slot(index)?.value;
  }

  /**
   * Mutable reference to the value for an Index, or undefined under the
   * same conditions as get().
   */
  public get_mut(index: Index): ArenaRef<T> | undefined {
    const slot = this.live_slot(index);
    return slot === undefined ? undefined : create_arena_ref(slot, index);
  }

  public contains(index: Index): boolean {
    return this.live_slot(index) !== undefined;
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Store a value and return its Index.
   *
   * Reuses the free-list head when there is one; the generation stored
   * in that FREE slot was already advanced by the remove that freed it.
   * Otherwise appends a fresh slot at INITIAL_GENERATION.
   */
  public insert(value: T): Index {
    const head = this.free_head;

    if (head === FREE_LIST_END) {
      const index = create_index(this.slots.length, INITIAL_GENERATION);
      this.slots.push(occupied_slot(value, INITIAL_GENERATION));
      this.live_count++;
      this.version++;
      return index;
    }

    const slot = this.slots[head];
    if (slot.state !== SLOT_STATE.FREE) {
      throw new ArenaError(ARENA_ERROR.FREE_LIST_CORRUPTED, undefined, {
        slot: head,
        state: slot.state,
      });
    }

    const index = create_index(head, slot.generation);
    this.free_head = slot.next_free;
    this.slots[head] = occupied_slot(value, slot.generation);
    this.live_count++;
    this.version++;
    return index;
  }

  /**
   * Overwrite the value for a live Index.
   * Returns false, changing nothing, when the Index does not resolve.
   */
  public set(index: Index, value: T): boolean {
    const slot = this.live_slot(index);
    if (slot === undefined) return false;
    slot.value = value;
    return true;
  }

  /**
   * Remove and return the value for an Index.
   *
   * A stale or invalid Index returns undefined and leaves the arena as
   * it was, so removing the same Index twice is harmless.
   */
  public remove(index: Index): T | undefined {
    const slot = this.live_slot(index);
    if (slot === undefined) return undefined;
    this.vacate(index.slot, slot);
    return slot.value;
  }

  /**
   * Remove every live entry. Each slot goes through the same transition
   * as remove(), so all outstanding indices become stale. Slots are
   * vacated from the back so the lowest positions are reused first.
   */
  public clear(): void {
    for (let i = this.slots.length - 1; i >= 0; i--) {
      const slot = this.slots[i];
      if (slot.state === SLOT_STATE.OCCUPIED) this.vacate(i, slot);
    }
  }

  /**
   * Append `additional` FREE slots at INITIAL_GENERATION. They are linked
   * in ascending order ahead of the existing free-list, so the next
   * inserts fill them front to back.
   */
  public reserve(additional: number): void {
    const count = validate_and_cast(
      additional,
      is_non_negative_integer,
      "reserve count must be a non-negative integer",
    );
    if (count === 0) return;

    const start = this.slots.length;
    for (let i = 0; i < count; i++) {
      const next = i === count - 1 ? this.free_head : start + i + 1;
      this.slots.push(free_slot(INITIAL_GENERATION, next));
    }
    this.free_head = start;
    this.version++;
  }

  //=========================================================
  // Iteration
  //=========================================================

  /** Live (Index, value) pairs in slot order. */
  public *entries(): IterableIterator<[Index, T]> {
    const version = this.version;
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot.state !== SLOT_STATE.OCCUPIED) continue;
      yield [create_index(i, slot.generation), slot.value];
      if (__DEV__) this.check_version(version);
    }
  }

  public *indices(): IterableIterator<Index> {
    for (const [index] of this.entries()) yield index;
  }

  public *values(): IterableIterator<T> {
    for (const [, value] of this.entries()) yield value;
  }

  public [Symbol.iterator](): IterableIterator<[Index, T]> {
    return this.entries();
  }

  /** Replace every live value with fn's result, in slot order. */
  public for_each_mut(fn: (value: T, index: Index) => T): void {
    const version = this.version;
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot.state !== SLOT_STATE.OCCUPIED) continue;
      const next = fn(slot.value, create_index(i, slot.generation));
      if (__DEV__) this.check_version(version);
      slot.value = next;
    }
  }

  //=========================================================
  // Internal
  //=========================================================

  private live_slot(index: Index): OccupiedSlot<T> | undefined {
    const slot = this.slots[index.slot];
    if (
      slot !== undefined &&
      slot.state === SLOT_STATE.OCCUPIED &&
      slot.generation === index.generation
    ) {
      return slot;
    }
    return undefined;
  }

  private vacate(position: number, slot: OccupiedSlot<T>): void {
    if (slot.generation >= this.max_generation) {
      // A wrapped generation could alias an old Index; drop the slot instead.
      this.slots[position] = retired_slot(slot.generation);
      this.retired++;
    } else {
      this.slots[position] = free_slot(slot.generation + 1, this.free_head);
      this.free_head = position;
    }
    this.live_count--;
    this.version++;
  }

  private check_version(expected: number): void {
    if (this.version !== expected) {
      throw new ArenaError(
        ARENA_ERROR.CONCURRENT_MODIFICATION,
        "arena was structurally modified during iteration",
      );
    }
  }
}
