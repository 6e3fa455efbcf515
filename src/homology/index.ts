export {
  describeHomology,
  homologySpecies,
  homologyAttributeName,
  expandHomology,
  type HomologyAttribute,
} from "./expander.js";
