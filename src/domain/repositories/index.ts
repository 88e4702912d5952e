export type { ArchiveRepository } from './archiveRepository';
export type { WeatherRepository } from './weatherRepository';
