/**
 * Window extraction, location mapping and prediction filtering
 */

export * from "./core";
export {
  getCorrectPredictions,
  getCorrectPredictionsByTask,
  getCorrectPredictionsFromModel,
  type LabelCell,
  type PredictionModel,
} from "./correct-predictions";
export {
  DEFAULT_MAPPING_OPTIONS,
  flankedRecord,
  flankName,
  mapFlanked,
  resolveMappingOptions,
} from "./flank-mapper";
export { getChromosome, loadWindows, sliceInterval } from "./genome-windows";
export { labeledRecord, mapWithLabels, validateLabelFeatures } from "./label-mapper";
export {
  type GenomeSource,
  loadIntervals,
  loadLabels,
  loadSequencesFromBed,
  processLocationsFromSimdata,
  processSeqsAndLocationsFromBed,
  processSeqsAndLocationsFromBedAndLabels,
  type SimdataFileOptions,
  writeLocations,
  writePaddedIntervals,
} from "./pipelines";
export { decodeSimdataLocations, placementRecords } from "./simdata";
