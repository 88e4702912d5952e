import { describe, expect, it } from 'vitest';
import {
  buildArchiveKey,
  extractObservationSummary,
  formatArchiveTimestamp,
  isWeatherObservation,
  MalformedObservationError,
  stampObservation,
} from '@/domain/entities';
import {
  createNairobiObservation,
  createSeattleObservation,
} from '../../fixtures/observations';

describe('weatherObservation', () => {
  describe('extractObservationSummary', () => {
    it('should extract temperature, feels like, humidity and description', () => {
      const summary = extractObservationSummary(
        createNairobiObservation(),
        'Nairobi',
      );

      expect(summary).toEqual({
        temperature: 75,
        feelsLike: 77,
        humidity: 60,
        description: 'clear sky',
      });
    });

    it('should ignore fields it does not report', () => {
      const summary = extractObservationSummary(
        createSeattleObservation(),
        'Seattle',
      );

      expect(summary).toEqual({
        temperature: 52.3,
        feelsLike: 50.9,
        humidity: 88,
        description: 'light rain',
      });
    });

    it('should throw MalformedObservationError when main is missing', () => {
      const observation = { weather: [{ description: 'clear sky' }] };

      expect(() => extractObservationSummary(observation, 'Nairobi')).toThrow(
        new MalformedObservationError('Nairobi', 'main'),
      );
      expect(() => extractObservationSummary(observation, 'Nairobi')).toThrow(
        'Unexpected weather data for Nairobi: missing or invalid main',
      );
    });

    it('should throw when the weather list is empty', () => {
      const observation = {
        main: { temp: 75, feels_like: 77, humidity: 60 },
        weather: [],
      };

      expect(() => extractObservationSummary(observation, 'Nairobi')).toThrow(
        'Unexpected weather data for Nairobi: missing or invalid weather[0].description',
      );
    });

    it('should throw when a reading is not a number', () => {
      const observation = {
        main: { temp: '75', feels_like: 77, humidity: 60 },
        weather: [{ description: 'clear sky' }],
      };

      expect(() => extractObservationSummary(observation, 'Nairobi')).toThrow(
        'Unexpected weather data for Nairobi: missing or invalid main.temp',
      );
    });
  });

  describe('formatArchiveTimestamp', () => {
    it('should format local time as YYYYMMDD-HHMMSS', () => {
      expect(formatArchiveTimestamp(new Date(2025, 0, 7, 9, 5, 3))).toBe(
        '20250107-090503',
      );
    });

    it('should zero-pad every component', () => {
      expect(formatArchiveTimestamp(new Date(2024, 11, 31, 23, 59, 59))).toBe(
        '20241231-235959',
      );
      expect(formatArchiveTimestamp(new Date(2025, 2, 1, 0, 0, 0))).toBe(
        '20250301-000000',
      );
    });
  });

  describe('buildArchiveKey', () => {
    it('should place the object under weather-data with city and timestamp', () => {
      expect(buildArchiveKey('Nairobi', '20250107-090503')).toBe(
        'weather-data/Nairobi-20250107-090503.json',
      );
    });

    it('should keep spaces in city names', () => {
      expect(buildArchiveKey('New York', '20250107-090503')).toBe(
        'weather-data/New York-20250107-090503.json',
      );
    });
  });

  describe('stampObservation', () => {
    it('should add the timestamp without modifying the original observation', () => {
      const observation = createNairobiObservation();

      const stamped = stampObservation(observation, '20250107-090503');

      expect(stamped).toEqual({
        main: { temp: 75, feels_like: 77, humidity: 60 },
        weather: [{ description: 'clear sky' }],
        timestamp: '20250107-090503',
      });
      expect(observation).not.toHaveProperty('timestamp');
    });
  });

  describe('isWeatherObservation', () => {
    it('should accept plain objects only', () => {
      expect(isWeatherObservation({ main: {} })).toBe(true);
      expect(isWeatherObservation([])).toBe(false);
      expect(isWeatherObservation(null)).toBe(false);
      expect(isWeatherObservation('clear sky')).toBe(false);
    });
  });
});
