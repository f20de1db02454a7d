export type { Brand } from "./brand";
export {
  is_non_negative_integer,
  is_integer_in_range,
  validate_and_cast,
  unsafe_cast,
} from "./assertions";
export { TYPE_ERROR, TypeError } from "./error";
