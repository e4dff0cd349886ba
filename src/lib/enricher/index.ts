/**
 * Enricher module - derived listing fields
 */

export { Enricher, DEFAULT_CATEGORY_OPTIONS, pricePerM2 } from "./enricher.js";
export {
  categorize,
  computeCategoryThresholds,
  FIXED_PRICE_THRESHOLDS,
} from "./price-category.js";
