export { Arena, type ArenaOptions } from "./arena/arena";
export type { ArenaRef } from "./arena/arena_ref";
export { SLOT_STATE, type Slot } from "./arena/slot";
