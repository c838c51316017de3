/**
 * Minimal logging seam used by clients, the scenario and reporters.
 */
export interface ScenarioLogger {
  info(message: string): void;
  error(message: string, error?: Error): void;
}

export const consoleLogger: ScenarioLogger = {
  info(message) {
    console.log(message);
  },
  error(message, error) {
    if (error === undefined) {
      console.error(message);
    } else {
      console.error(message, error.stack ?? error.message);
    }
  },
};

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
