/**
 * Core window and location primitives
 */

export {
  expandRegion,
  formatRegion,
  intervalsOverlap,
  padInterval,
  parseRegion,
  splitPadding,
  toAbsolute,
  toWindowRelative,
} from "./coordinates";
export {
  createLocationRecord,
  placementKey,
  type ResponseRegion,
  responseRegions,
  toLocationObject,
  windowKey,
} from "./locations";
export {
  ALPHABET_SIZE,
  decodeOneHot,
  encodeOneHot,
  nucleotideColumn,
  oneHotRows,
  stackWindows,
} from "./one-hot";
export { IntervalIndex, overlapJoin } from "./overlap";
export { formatPlacement, parsePlacement, parsePlacements } from "./placements";
