/**
 * pipeable/strings entry point
 *
 * String and null helpers.
 */
export {
  isNullOrEmpty,
  isNullOrBlank,
  trimToNull,
  trimToEmpty,
  blankToNull,
  trimmed,
} from "./strings";
export { orElse, orElseGet, mapTo, when, whenNotNull } from "./nulls";
