import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../errors.js";
import type { PollState } from "../poller.js";
import { SensorPoller } from "../poller.js";
import { Bme280Sensor } from "../sensors/bme280.js";
import { Ds18b20Sensor } from "../sensors/ds18b20.js";
import type { OneWireSource } from "../sensors/drivers.js";
import {
  FakeBme280Driver,
  FakeTransport,
  bme280Config,
  ds18b20Config,
  memoryOneWire,
  silentLogger,
} from "./test-helpers.js";

const PROBE_FILE = ds18b20Config().sensorFile;

function setup(options: { probe?: OneWireSource; garage?: FakeBme280Driver } = {}) {
  const transport = new FakeTransport();
  const logger = silentLogger();
  const garageDriver = options.garage ?? new FakeBme280Driver({ temperature: 18, humidity: 60, pressure: 1000 });
  const sensors = [
    new Ds18b20Sensor(ds18b20Config(), options.probe ?? memoryOneWire({ [PROBE_FILE]: "t=21500" })),
    new Bme280Sensor(bme280Config(), garageDriver),
  ];
  const poller = new SensorPoller({ sensors, transport, logger, interval: 10 });
  return { transport, logger, garageDriver, poller };
}

describe("SensorPoller.pollOnce", () => {
  it("should publish one non-retained state message per sensor", async () => {
    const { transport, poller } = setup();

    const summary = await poller.pollOnce();

    expect(summary).toEqual({
      published: ["testhost/probe/state", "testhost/garage/state"],
      failed: [],
    });
    expect(transport.published).toEqual([
      { topic: "testhost/probe/state", message: { temperature: 21.5 }, retain: false },
      { topic: "testhost/garage/state", message: { temperature: 18, humidity: 60, pressure: 1000 }, retain: false },
    ]);
    expect(poller.state).toEqual({ phase: "idle" });
  });

  it("should skip a failing sensor and still publish the others", async () => {
    const { transport, logger, poller } = setup({ probe: memoryOneWire({}) });

    const summary = await poller.pollOnce();

    expect(summary.published).toEqual(["testhost/garage/state"]);
    expect(summary.failed).toEqual([
      {
        section: "sensor_probe",
        reason: `[ds18b20 Probe] ENOENT: no such file or directory, open '${PROBE_FILE}'`,
      },
    ]);
    expect(transport.published.map((message) => message.topic)).toEqual(["testhost/garage/state"]);
    expect(logger.warn).toHaveBeenCalledWith(
      `Skipping this cycle: [ds18b20 Probe] ENOENT: no such file or directory, open '${PROBE_FILE}'`,
    );
    expect(poller.isDisabled("sensor_probe")).toBe(false);
  });

  it("should retry a transiently failing sensor on the next cycle", async () => {
    const files: Record<string, string> = {};
    const { transport, poller } = setup({ probe: memoryOneWire(files) });

    await poller.pollOnce();
    files[PROBE_FILE] = "22.25";
    await poller.pollOnce();

    expect(transport.published.filter((message) => message.topic === "testhost/probe/state")).toEqual([
      { topic: "testhost/probe/state", message: { temperature: 22.3 }, retain: false },
    ]);
  });

  it("should disable a sensor with a configuration error until restart", async () => {
    const garage = new FakeBme280Driver(new ConfigurationError("bme280 driver module is not installed"));
    const { logger, poller } = setup({ garage });

    const first = await poller.pollOnce();
    const second = await poller.pollOnce();

    expect(first.failed).toEqual([
      { section: "sensor_garage", reason: "[bme280 Garage] bme280 driver module is not installed" },
    ]);
    expect(second.failed).toEqual([]);
    expect(second.published).toEqual(["testhost/probe/state"]);
    expect(garage.sessions).toHaveLength(1);
    expect(poller.isDisabled("sensor_garage")).toBe(true);
    expect(logger.error).toHaveBeenCalledWith(
      "Disabling sensor until restart: [bme280 Garage] bme280 driver module is not installed",
    );
  });

  it("should carry on after a failed publish", async () => {
    const { transport, logger, poller } = setup();
    transport.failingTopics.add("testhost/probe/state");

    const summary = await poller.pollOnce();

    expect(summary).toEqual({
      published: ["testhost/garage/state"],
      failed: [{ section: "sensor_probe", reason: "broker rejected testhost/probe/state" }],
    });
    expect(logger.error).toHaveBeenCalledWith(
      "Publishing sensor_probe to testhost/probe/state failed:",
      "broker rejected testhost/probe/state",
    );
  });

  it("should not publish a reading taken while being cancelled", async () => {
    const controller = new AbortController();
    const probe: OneWireSource = {
      async read() {
        controller.abort();
        return "21.0";
      },
    };
    const { transport, garageDriver, poller } = setup({ probe });

    const summary = await poller.pollOnce(controller.signal);

    expect(summary).toEqual({ published: [], failed: [] });
    expect(transport.published).toEqual([]);
    expect(garageDriver.sessions).toEqual([]);
    expect(poller.state).toEqual({ phase: "idle" });
  });

  it("should read nothing once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { transport, garageDriver, poller } = setup();

    await poller.pollOnce(controller.signal);

    expect(transport.published).toEqual([]);
    expect(garageDriver.sessions).toEqual([]);
  });

  it("should report the sensor being read", async () => {
    const states: PollState[] = [];
    let poller: SensorPoller | undefined;
    const probe: OneWireSource = {
      async read() {
        if (poller) {
          states.push(poller.state);
        }
        return "21.0";
      },
    };
    poller = setup({ probe }).poller;

    await poller.pollOnce();

    expect(states).toEqual([{ phase: "reading", section: "sensor_probe" }]);
  });
});

describe("SensorPoller shutdown", () => {
  class StalledTransport extends FakeTransport {
    readonly attempted: string[] = [];

    constructor(private readonly onPublish: () => void) {
      super();
    }

    publish(topic: string): Promise<void> {
      this.attempted.push(topic);
      this.onPublish();
      return new Promise<void>(() => {});
    }
  }

  it("should stop waiting for a publish the broker never acknowledges", async () => {
    const controller = new AbortController();
    const transport = new StalledTransport(() => controller.abort());
    const logger = silentLogger();
    const garage = new FakeBme280Driver({ temperature: 18, humidity: 60, pressure: 1000 });
    const poller = new SensorPoller({
      sensors: [
        new Ds18b20Sensor(ds18b20Config(), memoryOneWire({ [PROBE_FILE]: "21.0" })),
        new Bme280Sensor(bme280Config(), garage),
      ],
      transport,
      logger,
      interval: 10,
    });

    await poller.run(controller.signal);

    expect(transport.attempted).toEqual(["testhost/probe/state"]);
    expect(garage.sessions).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("Gave up publishing to testhost/probe/state on shutdown");
    expect(poller.state).toEqual({ phase: "stopped" });
  });
});

describe("SensorPoller.run", () => {
  it("should sleep for the interval minus the time spent polling", async () => {
    const controller = new AbortController();
    const transport = new FakeTransport();
    const times = [1000, 1250];
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {
      controller.abort();
    });
    const poller = new SensorPoller({
      sensors: [new Ds18b20Sensor(ds18b20Config(), memoryOneWire({ [PROBE_FILE]: "21.0" }))],
      transport,
      logger: silentLogger(),
      interval: 10,
      sleep,
      now: () => times.shift() ?? 0,
    });

    await poller.run(controller.signal);

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(9750, controller.signal);
    expect(transport.published).toHaveLength(1);
    expect(poller.state).toEqual({ phase: "stopped" });
  });

  it("should poll again after each sleep until cancelled", async () => {
    const controller = new AbortController();
    const transport = new FakeTransport();
    let cycles = 0;
    const sleep = vi.fn(async () => {
      cycles += 1;
      if (cycles === 3) {
        controller.abort();
      }
    });
    const poller = new SensorPoller({
      sensors: [new Ds18b20Sensor(ds18b20Config(), memoryOneWire({ [PROBE_FILE]: "21.0" }))],
      transport,
      logger: silentLogger(),
      interval: 1,
      sleep,
      now: () => 0,
    });

    await poller.run(controller.signal);

    expect(transport.published).toHaveLength(3);
    expect(sleep).toHaveBeenCalledWith(1000, controller.signal);
  });
});
