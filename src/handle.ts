/***
 * Index — Untyped generational handle (slot | generation).
 *
 * An Index names one occupancy of one arena slot. The slot field is the
 * position in the arena's backing sequence; the generation field says
 * which occupant of that position the handle was issued for. Both are
 * unsigned 32-bit integers, and a handle that is still valid always has
 * a non-zero generation.
 *
 * Indices carry no type parameter: Arena<Mesh> and Arena<Sound> hand out
 * the same Index type, so a host can keep handles next to its own data
 * without a per-type side table. The flip side is that an Index from one
 * arena used against another arena is not detected.
 *
 * Raw layout (bigint, for hashing or crossing a serialization boundary):
 *
 *   index_to_raw(idx)   → (slot << 32) | generation
 *   index_from_raw(raw) → { slot: raw >> 32, generation: raw & 0xFFFFFFFF }
 *
 ***/

import { type Brand, unsafe_cast } from "type_primitives";
import { ARENA_ERROR, ArenaError } from "./utils/error";
import {
  MAX_GENERATION,
  MAX_RAW_INDEX,
  MAX_SLOT,
  RAW_GENERATION_BITS,
  RAW_GENERATION_MASK,
} from "./utils/constants";

export type Index = Brand<
  Readonly<{ slot: number; generation: number }>,
  "arena_index"
>;

const is_u32 = (v: number, max: number): boolean =>
  Number.isInteger(v) && v >= 0 && v <= max;

export const create_index = (slot: number, generation: number): Index => {
  if (__DEV__) {
    if (!is_u32(slot, MAX_SLOT)) {
      throw new ArenaError(ARENA_ERROR.INDEX_SLOT_OVERFLOW, undefined, {
        slot,
      });
    }

    if (!is_u32(generation, MAX_GENERATION)) {
      throw new ArenaError(ARENA_ERROR.INDEX_GENERATION_OVERFLOW, undefined, {
        generation,
      });
    }
  }
  return unsafe_cast<Index>(Object.freeze({ slot, generation }));
};

/** Two indices are equal iff slot and generation both match. */
export const index_equals = (a: Index, b: Index): boolean =>
  a.slot === b.slot && a.generation === b.generation;

/** Orders by slot, then by generation. */
export const index_compare = (a: Index, b: Index): number => {
  if (a.slot !== b.slot) return a.slot - b.slot;
  return a.generation - b.generation;
};

export const index_to_raw = (index: Index): bigint =>
  (BigInt(index.slot) << RAW_GENERATION_BITS) | BigInt(index.generation);

export const index_from_raw = (raw: bigint): Index => {
  if (raw < 0n || raw > MAX_RAW_INDEX) {
    throw new ArenaError(ARENA_ERROR.INDEX_RAW_OUT_OF_RANGE, undefined, {
      raw: raw.toString(),
    });
  }
  return create_index(
    Number(raw >> RAW_GENERATION_BITS),
    Number(raw & RAW_GENERATION_MASK),
  );
};

export const format_index = (index: Index): string =>
  `Index(${index.slot}:${index.generation})`;
