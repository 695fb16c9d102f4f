/**
 * Grid Layout Module
 */

export { parseLayout } from './layout-parser';
export { tokenizeLayout, isTerminatingChar } from './tokenizer';
export { RegionRegistry, lookupRegion } from './region-registry';
