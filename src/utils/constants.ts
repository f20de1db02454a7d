// Index field limits (both fields are unsigned 32-bit)
export const MAX_SLOT = 0xffff_ffff;
export const MAX_GENERATION = 0xffff_ffff;

// Slots are born at generation 1; generation 0 is never handed out
export const INITIAL_GENERATION = 1;

// Sentinel terminating the embedded free-list
export const FREE_LIST_END = -1;

// Raw (bigint) index packing: [slot:32][generation:32]
export const RAW_GENERATION_BITS = 32n;
export const RAW_GENERATION_MASK = 0xffff_ffffn;
export const MAX_RAW_INDEX = 0xffff_ffff_ffff_ffffn;

export const DEFAULT_INITIAL_CAPACITY = 0;
