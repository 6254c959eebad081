import { ConfigurationError, type SensorError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Transport } from "./publish.js";
import type { Sensor } from "./sensors/base.js";
import { raceAbort, sleep } from "./utils.js";

export type PollState =
  | { phase: "idle" }
  | { phase: "reading"; section: string }
  | { phase: "publishing"; section: string }
  | { phase: "stopped" };

export interface PollCycleSummary {
  published: string[];
  failed: Array<{ section: string; reason: string }>;
}

export interface SensorPollerOptions {
  sensors: readonly Sensor[];
  transport: Transport;
  logger: Logger;
  /** Seconds between the starts of two cycles. */
  interval: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

const IDLE: PollState = { phase: "idle" };

/**
 * Reads every sensor in turn and publishes its state, once per interval.
 * A failing sensor is logged and skipped; sensors with a configuration
 * error stay disabled until the process restarts.
 */
export class SensorPoller {
  private current: PollState = IDLE;

  private readonly disabled = new Set<string>();

  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private readonly now: () => number;

  constructor(private readonly options: SensorPollerOptions) {
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date().getTime());
  }

  get state(): PollState {
    return this.current;
  }

  isDisabled(section: string): boolean {
    return this.disabled.has(section);
  }

  /**
   * Run one cycle. Stops before the next sensor once `signal` is aborted,
   * never publishes a reading taken while the abort came in, and stops
   * waiting for a publish that is still in flight.
   */
  async pollOnce(signal?: AbortSignal): Promise<PollCycleSummary> {
    const summary: PollCycleSummary = { published: [], failed: [] };
    const { transport, logger } = this.options;

    for (const sensor of this.options.sensors) {
      if (signal?.aborted) {
        break;
      }
      if (this.disabled.has(sensor.section)) {
        continue;
      }

      this.current = { phase: "reading", section: sensor.section };
      const result = await sensor.read();
      if (!result.ok) {
        this.handleReadFailure(sensor.section, result.error);
        summary.failed.push({ section: sensor.section, reason: result.error.describe() });
        this.current = IDLE;
        continue;
      }
      if (signal?.aborted) {
        this.current = IDLE;
        break;
      }

      this.current = { phase: "publishing", section: sensor.section };
      try {
        const outcome = await raceAbort(transport.publish(sensor.stateTopic, result.reading), signal);
        if (!outcome.settled) {
          logger.warn(`Gave up publishing to ${sensor.stateTopic} on shutdown`);
          this.current = IDLE;
          break;
        }
        logger.log(`Published to ${sensor.stateTopic}: ${JSON.stringify(result.reading)}`);
        summary.published.push(sensor.stateTopic);
      } catch (err) {
        logger.error(`Publishing ${sensor.section} to ${sensor.stateTopic} failed:`, errorMessage(err));
        summary.failed.push({ section: sensor.section, reason: errorMessage(err) });
      }
      this.current = IDLE;
    }

    return summary;
  }

  /**
   * Poll until `signal` is aborted. The caller disconnects the transport.
   */
  async run(signal: AbortSignal): Promise<void> {
    const intervalMs = this.options.interval * 1000;
    while (!signal.aborted) {
      const start = this.now();
      await this.pollOnce(signal);
      if (signal.aborted) {
        break;
      }
      const sleepInterval = intervalMs - (this.now() - start);
      this.options.logger.log(`Sleeping for ${sleepInterval}ms...`);
      await this.sleep(sleepInterval, signal);
    }
    this.current = { phase: "stopped" };
  }

  private handleReadFailure(section: string, error: SensorError): void {
    const { logger } = this.options;
    if (error instanceof ConfigurationError) {
      this.disabled.add(section);
      logger.error(`Disabling sensor until restart: ${error.describe()}`);
      return;
    }
    logger.warn(`Skipping this cycle: ${error.describe()}`);
  }
}
