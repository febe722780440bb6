export * from './types';
export {
  Gazetteer,
  GazetteerDataSchema,
  foldText,
  type GazetteerData,
  type NormalizedLocation,
  type LocationMentions,
  type CityEntry,
  type RegionEntry,
  type CountryEntry,
} from './Gazetteer';
export { parseAdjudication, type AdjudicationAnswer } from './adjudication-parser';
export { classifyRisk } from './risk';
export { LocationValidationStats, type LocationStatsSnapshot } from './LocationValidationStats';
export {
  HybridLocationValidator,
  DEFAULT_LOCATION_CONFIG,
  LOCATION_CONFIDENCE,
  type LocationValidatorConfig,
  type ValidateLocationOptions,
} from './HybridLocationValidator';
