/**
 * Driver Service Interface
 *
 * Handle to a locally running driver process (chromedriver, geckodriver, ...).
 * The caller owns the process: it starts and stops it, this package only
 * records which service a session should be created on.
 */

export interface DriverService {
  /** Human-readable name used in logs, e.g. "geckodriver" */
  readonly name: string;

  /** Whether the process is currently accepting connections */
  isRunning(): boolean;

  /** Base URL the driver listens on, e.g. http://localhost:4444 */
  getUrl(): URL;
}

/**
 * Type guard for values supplied as a driver service
 */
export function isDriverService(value: unknown): value is DriverService {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'isRunning' in value &&
    typeof value.isRunning === 'function' &&
    'getUrl' in value &&
    typeof value.getUrl === 'function'
  );
}
