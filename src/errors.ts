export type SensorErrorCode = "CONFIG_ERROR" | "READ_ERROR";

export interface SensorErrorContext {
  sensorType?: string;
  deviceName?: string;
  section?: string;
}

export class SensorError extends Error {
  public readonly code: SensorErrorCode;
  public readonly sensorType?: string;
  public readonly deviceName?: string;
  public readonly section?: string;

  constructor(params: { code: SensorErrorCode; message: string; context?: SensorErrorContext; cause?: unknown }) {
    super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
    this.name = "SensorError";
    this.code = params.code;
    this.sensorType = params.context?.sensorType;
    this.deviceName = params.context?.deviceName;
    this.section = params.context?.section;
  }

  /**
   * "[bme280 Garage] message", or just the message when no context is known.
   */
  describe(): string {
    const label = [this.sensorType, this.deviceName].filter(Boolean).join(" ");
    return label ? `[${label}] ${this.message}` : this.message;
  }
}

/**
 * Unknown sensor type, missing parameter or unusable driver.
 * Disables the affected sensor for the rest of the run.
 */
export class ConfigurationError extends SensorError {
  constructor(message: string, context?: SensorErrorContext, cause?: unknown) {
    super({ code: "CONFIG_ERROR", message, context, cause });
    this.name = "ConfigurationError";
  }
}

/**
 * Bus timing or checksum failure, no data: skipped, retried next cycle.
 */
export class TransientReadError extends SensorError {
  constructor(message: string, context?: SensorErrorContext, cause?: unknown) {
    super({ code: "READ_ERROR", message, context, cause });
    this.name = "TransientReadError";
  }
}

/**
 * Wrap anything thrown by a driver. Errors without a sensor context pick up
 * the given one; foreign errors become transient read errors.
 */
export function asSensorError(err: unknown, context: SensorErrorContext): SensorError {
  if (err instanceof ConfigurationError) {
    return err.deviceName !== undefined ? err : new ConfigurationError(err.message, context, err.cause);
  }
  if (err instanceof TransientReadError) {
    return err.deviceName !== undefined ? err : new TransientReadError(err.message, context, err.cause);
  }
  if (err instanceof SensorError) {
    return err;
  }
  if (err instanceof Error) {
    return new TransientReadError(err.message, context, err);
  }
  return new TransientReadError(`Unknown error: ${String(err)}`, context, err);
}

export function errorMessage(err: unknown): string {
  if (err instanceof SensorError) {
    return err.describe();
  }
  return err instanceof Error ? err.message : String(err);
}
