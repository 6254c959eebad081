import { hostname } from "node:os";
import { Command, CommanderError } from "commander";
import { type AppConfig, anonymizeConfig, loadConfig } from "./config.js";
import { Daemon } from "./daemon.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { type Logger, consoleLogger } from "./logger.js";
import { MqttPublisher, type Transport } from "./publish.js";
import { type SensorDrivers, createDefaultDrivers } from "./sensors/factory.js";

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

/**
 * Everything the command touches outside the daemon itself.
 */
export interface CliDependencies {
  hostname(): string;
  createLogger(verbose: boolean): Logger;
  createTransport(config: AppConfig, logger: Logger): Transport;
  createDrivers(): SensorDrivers;
  signals: SignalSource;
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export function nodeDependencies(): CliDependencies {
  return {
    hostname,
    createLogger: consoleLogger,
    createTransport: (config, logger) =>
      new MqttPublisher({
        url: config.mqtt.url,
        clientId: config.mqtt.clientId,
        username: config.mqtt.username,
        password: config.mqtt.password,
        logger,
      }),
    createDrivers: createDefaultDrivers,
    signals: process,
    writeOut: (text) => {
      process.stdout.write(text);
    },
    writeErr: (text) => {
      process.stderr.write(text);
    },
  };
}

async function run(configPath: string, deps: CliDependencies): Promise<void> {
  const host = deps.hostname();
  const config = loadConfig(configPath, host);
  const logger = deps.createLogger(config.verbose);
  logger.log(JSON.stringify(anonymizeConfig(config)));

  const daemon = new Daemon({
    config,
    hostname: host,
    transport: deps.createTransport(config, logger),
    drivers: deps.createDrivers(),
    logger,
  });

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn(`Received ${signal} again, still shutting down...`);
      return;
    }
    logger.log(`Received ${signal}, shutting down...`);
    controller.abort();
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    deps.signals.on(signal, shutdown);
  }
  try {
    await daemon.start(controller.signal);
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      deps.signals.off(signal, shutdown);
    }
  }
}

export function createProgram(deps: CliDependencies): Command {
  const program = new Command()
    .name("sensor2mqtt")
    .description("Publish local sensor readings to MQTT with Home Assistant discovery")
    .argument("<config>", "path to the INI configuration file")
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({ writeOut: deps.writeOut, writeErr: deps.writeErr });

  program.action(async (configPath: string) => {
    try {
      await run(configPath, deps);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        program.error(`error: ${err.message}`);
      }
      throw err;
    }
  });
  return program;
}

/**
 * Run the command line and resolve with the process exit code: 0 after an
 * orderly shutdown, 1 for usage and configuration errors or a crash.
 */
export async function main(argv: readonly string[], deps: CliDependencies = nodeDependencies()): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    deps.writeErr(`${errorMessage(err)}\n`);
    return 1;
  }
}
