import type { ObservationSummary, TemperatureUnits } from '@/domain/entities';

const TEMPERATURE_SUFFIX: Record<TemperatureUnits, string> = {
  imperial: '°F',
  metric: '°C',
  standard: 'K',
};

export function formatTemperature(
  value: number,
  units: TemperatureUnits,
): string {
  return `${value}${TEMPERATURE_SUFFIX[units]}`;
}

/**
 * Format the console lines printed for one observation
 */
export function formatObservationLines(
  summary: ObservationSummary,
  units: TemperatureUnits,
): string[] {
  return [
    `Temperature: ${formatTemperature(summary.temperature, units)}`,
    `Feels like: ${formatTemperature(summary.feelsLike, units)}`,
    `Humidity: ${summary.humidity}%`,
    `Conditions: ${summary.description}`,
  ];
}
