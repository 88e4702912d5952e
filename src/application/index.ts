export {
  ARCHIVE_CONTENT_TYPE,
  ArchiveObservationUseCase,
  type ArchiveObservationUseCaseDeps,
  type ArchiveReceipt,
} from './archiveObservationUseCase';
export {
  type BucketStatus,
  EnsureBucketUseCase,
  type EnsureBucketUseCaseDeps,
} from './ensureBucketUseCase';
export {
  FetchWeatherUseCase,
  type FetchWeatherUseCaseDeps,
} from './fetchWeatherUseCase';
export {
  type CityOutcome,
  type RunReporter,
  RunWeatherArchiveUseCase,
  type RunWeatherArchiveOutput,
  type RunWeatherArchiveUseCaseDeps,
} from './runWeatherArchiveUseCase';
