import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { DeviceDescriptor, SensorConfig } from "./models.js";
import type { Transport } from "./publish.js";
import { HomeAssistantDiscovery } from "./sensors/homeassistant.js";

export interface AnnounceSummary {
  published: string[];
  failed: Array<{ section: string; error: string }>;
}

/**
 * Publishes retained discovery messages for every configured sensor each
 * time the transport reports a (re)connection.
 */
export class DiscoveryAnnouncer {
  private readonly discovery: HomeAssistantDiscovery;

  constructor(
    private readonly transport: Transport,
    private readonly sensors: readonly SensorConfig[],
    device: DeviceDescriptor,
    hostname: string,
    private readonly logger: Logger,
  ) {
    this.discovery = new HomeAssistantDiscovery(hostname, device);
  }

  attach(): void {
    this.transport.onConnected(() => {
      this.announce().catch((err) => {
        this.logger.error("Discovery announcement failed:", errorMessage(err));
      });
    });
  }

  async announce(): Promise<AnnounceSummary> {
    const summary: AnnounceSummary = { published: [], failed: [] };
    for (const sensor of this.sensors) {
      try {
        for (const entry of this.discovery.buildDiscoveryMessages(sensor)) {
          await this.transport.publish(entry.topic, entry.payload, { retain: true });
          this.logger.log(`Discovery -> ${entry.topic}`);
          summary.published.push(entry.topic);
        }
      } catch (err) {
        this.logger.error(`Discovery for ${sensor.section} failed:`, errorMessage(err));
        summary.failed.push({ section: sensor.section, error: errorMessage(err) });
      }
    }
    return summary;
  }
}
