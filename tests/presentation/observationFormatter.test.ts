import { describe, expect, it } from 'vitest';
import { formatObservationLines, formatTemperature } from '@/presentation';

describe('observationFormatter', () => {
  describe('formatTemperature', () => {
    it('should append the unit symbol for each unit system', () => {
      expect(formatTemperature(75, 'imperial')).toBe('75°F');
      expect(formatTemperature(23.9, 'metric')).toBe('23.9°C');
      expect(formatTemperature(297.04, 'standard')).toBe('297.04K');
    });
  });

  describe('formatObservationLines', () => {
    it('should format the four report lines', () => {
      const lines = formatObservationLines(
        {
          temperature: 75,
          feelsLike: 77,
          humidity: 60,
          description: 'clear sky',
        },
        'imperial',
      );

      expect(lines).toEqual([
        'Temperature: 75°F',
        'Feels like: 77°F',
        'Humidity: 60%',
        'Conditions: clear sky',
      ]);
    });
  });
});
