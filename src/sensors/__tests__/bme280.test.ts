import { describe, expect, it } from "vitest";
import { TransientReadError } from "../../errors.js";
import { Bme280Sensor } from "../bme280.js";
import { FakeBme280Driver, bme280Config } from "../../__tests__/test-helpers.js";

describe("Bme280Sensor", () => {
  it("should read all three quantities in one session", async () => {
    const driver = new FakeBme280Driver({ temperature: 18.234, humidity: 61.789, pressure: 1008.456 });
    const sensor = new Bme280Sensor(bme280Config({ i2cAddress: 0x77, i2cBus: 3 }), driver);

    const result = await sensor.read();

    expect(result).toEqual({
      ok: true,
      reading: { temperature: 18.23, humidity: 61.79, pressure: 1008.46 },
    });
    expect(driver.sessions).toEqual([{ i2cBus: 3, i2cAddress: 0x77, closed: true }]);
  });

  it("should fail as a whole when a quantity is missing", async () => {
    const driver = new FakeBme280Driver({ temperature: 18, humidity: 60 });
    const sensor = new Bme280Sensor(bme280Config(), driver);

    const result = await sensor.read();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransientReadError);
      expect(result.error.message).toBe("Sample is missing pressure");
    }
  });

  it("should close the session when the transaction fails", async () => {
    const driver = new FakeBme280Driver(new Error("Remote I/O error"));
    const sensor = new Bme280Sensor(bme280Config(), driver);

    const result = await sensor.read();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.describe()).toBe("[bme280 Garage] Remote I/O error");
    }
    expect(driver.sessions[0].closed).toBe(true);
  });

  it("should open a fresh session for every read", async () => {
    const driver = new FakeBme280Driver({ temperature: 18, humidity: 60, pressure: 1000 });
    const sensor = new Bme280Sensor(bme280Config(), driver);

    await sensor.read();
    await sensor.read();

    expect(driver.sessions).toHaveLength(2);
    expect(driver.sessions.every((session) => session.closed)).toBe(true);
  });
});
