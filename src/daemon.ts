import { DiscoveryAnnouncer } from "./announcer.js";
import type { AppConfig } from "./config.js";
import { ConfigurationError, asSensorError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { SensorConfig } from "./models.js";
import { SensorPoller } from "./poller.js";
import type { Transport } from "./publish.js";
import type { Sensor } from "./sensors/base.js";
import { type SensorDrivers, SensorFactory } from "./sensors/factory.js";

export interface DaemonOptions {
  config: AppConfig;
  hostname: string;
  transport: Transport;
  drivers: SensorDrivers;
  logger: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Wires configuration, sensors, discovery and the poll loop onto one
 * transport. Both the announcer and the poller work from the same sensor
 * list, fixed at construction.
 */
export class Daemon {
  readonly sensors: readonly Sensor[];

  readonly announcer: DiscoveryAnnouncer;

  readonly poller: SensorPoller;

  constructor(private readonly options: DaemonOptions) {
    const { config, logger } = options;
    for (const rejected of config.rejected) {
      logger.error(`Ignoring sensor section: ${rejected.describe()}`);
    }

    const sensors: Sensor[] = [];
    const configs: SensorConfig[] = [];
    for (const sensorConfig of config.sensors) {
      try {
        sensors.push(SensorFactory.createSensor(sensorConfig, options.drivers));
        configs.push(sensorConfig);
      } catch (err) {
        const error = asSensorError(err, { section: sensorConfig.section, deviceName: sensorConfig.deviceName });
        if (!(error instanceof ConfigurationError)) {
          throw err;
        }
        logger.error(`Ignoring sensor section: ${error.describe()}`);
      }
    }
    this.sensors = sensors;

    this.announcer = new DiscoveryAnnouncer(options.transport, configs, config.device, options.hostname, logger);
    this.poller = new SensorPoller({
      sensors,
      transport: options.transport,
      logger,
      interval: config.sleepInterval,
      sleep: options.sleep,
    });
  }

  /**
   * Connect, poll until `signal` is aborted, then disconnect.
   */
  async start(signal: AbortSignal): Promise<void> {
    const { transport, logger } = this.options;
    this.announcer.attach();
    transport.connect();
    logger.log(`Polling ${this.sensors.length} sensor(s) every ${this.options.config.sleepInterval}s`);
    try {
      await this.poller.run(signal);
    } finally {
      logger.log("Disconnecting...");
      await transport.disconnect();
    }
  }
}
