// Arena
export { Arena, type ArenaOptions, type ArenaRef } from "./arena";

// Handles
export {
  type Index,
  create_index,
  index_equals,
  index_compare,
  index_to_raw,
  index_from_raw,
  format_index,
} from "./handle";

// Errors
export { ARENA_ERROR, ArenaError, AppError, is_arena_error } from "./utils/error";
export { TYPE_ERROR, TypeError } from "type_primitives";

// Limits
export {
  MAX_SLOT,
  MAX_GENERATION,
  INITIAL_GENERATION,
} from "./utils/constants";
