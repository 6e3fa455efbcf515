export {
  defaultAttributes,
  validateAttributes,
  validateFilters,
  toFilterClause,
  InvalidFilterValueError,
  type FilterValue,
} from "./validator.js";
