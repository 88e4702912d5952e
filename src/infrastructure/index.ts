export {
  DEFAULT_OPENWEATHER_BASE_URL,
  type FetchFunction,
  OpenWeatherMapRepository,
  type OpenWeatherMapRepositoryOptions,
} from './openWeatherMapRepository';
export { S3ArchiveRepository } from './s3ArchiveRepository';
