export { createConsoleReporter } from './consoleReporter';
export {
  formatObservationLines,
  formatTemperature,
} from './observationFormatter';
