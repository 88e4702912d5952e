export {
  ArchiveError,
  type ArchiveErrorReason,
  BucketEnsureError,
  MalformedObservationError,
  WeatherFetchError,
} from './errors';
export { err, ok, type Result, toError } from './result';
export {
  ARCHIVE_KEY_PREFIX,
  type ArchivedObservation,
  buildArchiveKey,
  extractObservationSummary,
  formatArchiveTimestamp,
  isWeatherObservation,
  type ObservationSummary,
  stampObservation,
  type TemperatureUnits,
  type WeatherObservation,
} from './weatherObservation';
