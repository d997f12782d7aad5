#!/usr/bin/env node
/**
 * @fileoverview `pawlink` command line.
 *
 *   pawlink ports                      list serial ports, likely devices first
 *   pawlink connect [--port <path>]    drive a device on a serial port
 *   pawlink simulate                   drive the in-process virtual device
 *
 * Common options: `--config <file>`, `--log-level <level>`.
 */

import { parseArgs } from 'util';
import { loadHostConfig } from './config/config-loader';
import type { HostConfig } from './config/types';
import type { DeviceFrame } from './device/runtime';
import { VirtualDeviceTransport } from './device/virtual-transport';
import { getErrorMessage, isPawlinkError } from './errors';
import { createHostSession, type HostSession } from './host/host-session';
import { StdinKeySource } from './host/stdin-key-source';
import { OsTelemetrySampler } from './host/telemetry';
import { listPortCandidates } from './link/port-discovery';
import { createSerialTransport } from './link/serial-transport';
import { createLogger, isLogLevel, type Logger } from './logging';

const USAGE = `Usage: pawlink <command> [options]

Commands:
  ports                 List serial ports
  connect               Connect to a device and stream typing cadence
  simulate              Run against the in-process virtual device

Options:
  --port <path|auto>    Serial port (connect only)
  --config <file>       Configuration file
  --log-level <level>   debug | info | warn | error | silent
  -h, --help            Show this help
`;

interface CliOptions {
  command: string | undefined;
  port: string | undefined;
  config: string | undefined;
  logLevel: string | undefined;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      port: { type: 'string', short: 'p' },
      config: { type: 'string', short: 'c' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
  return {
    command: positionals[0],
    port: values.port,
    config: values.config,
    logLevel: values['log-level'],
    help: values.help ?? false,
  };
}

function resolveConfig(options: CliOptions): { config: HostConfig; logger: Logger } {
  const loaded = loadHostConfig(process.cwd(), options.config);
  const level = options.logLevel ?? loaded.config.logLevel;
  const logger = createLogger(isLogLevel(level) ? level : loaded.config.logLevel);
  if (options.logLevel !== undefined && !isLogLevel(options.logLevel)) {
    logger.warn(`Unknown log level "${options.logLevel}", using ${loaded.config.logLevel}`);
  }
  if (loaded.source !== undefined) {
    logger.debug(`Configuration loaded from ${loaded.source}`);
  }
  for (const warning of loaded.warnings) {
    logger.warn(warning);
  }
  return { config: loaded.config, logger };
}

async function listPorts(): Promise<number> {
  const candidates = await listPortCandidates();
  if (candidates.length === 0) {
    console.log('No serial ports found');
    return 0;
  }
  for (const port of candidates) {
    const marker = port.likelyDevice ? '*' : ' ';
    const ids = port.vendorId !== '' ? ` [${port.vendorId}:${port.productId}]` : '';
    console.log(`${marker} ${port.path}  ${port.manufacturer}${ids}`);
  }
  return 0;
}

type RunnableSession = Pick<HostSession, 'start' | 'stop' | 'connect'>;

/**
 * Runs a session until Ctrl+C (raw mode) or SIGINT. Resolves 1 when the session cannot
 * start or connect.
 */
export function runUntilInterrupted(
  session: RunnableSession,
  logger: Logger,
  target: string,
  interrupt: InterruptHook
): Promise<number> {
  return new Promise<number>((resolve) => {
    let stopping = false;
    const shutdown = (exitCode = 0): void => {
      if (stopping) {
        return;
      }
      stopping = true;
      process.off('SIGINT', onSigint);
      session
        .stop()
        .then(() => resolve(exitCode))
        .catch((err: unknown) => {
          logger.error(`Shutdown failed: ${getErrorMessage(err)}`);
          resolve(1);
        });
    };
    const onSigint = (): void => shutdown();
    process.once('SIGINT', onSigint);
    interrupt.handler = () => shutdown();

    session
      .start()
      .then(() => session.connect(target))
      .then(() => logger.info('Typing is being streamed; press Ctrl+C to quit'))
      .catch((err: unknown) => {
        logger.error(getErrorMessage(err));
        shutdown(1);
      });
  });
}

/** Raw-mode Ctrl+C arrives through the key source, not as SIGINT. */
export interface InterruptHook {
  handler: () => void;
}

function createKeySource(interrupt: InterruptHook): StdinKeySource {
  return new StdinKeySource({ onInterrupt: () => interrupt.handler() });
}

function describeFrame(frame: DeviceFrame): string {
  const { sprites } = frame;
  const layers = [sprites.body, sprites.face, sprites.paws ?? '-', sprites.effects ?? '-'].join(' ');
  const readings = frame.lines.map((line) => line.text).join(' | ');
  return `${frame.state}${frame.streak ? '+STREAK' : ''} [${layers}] ${readings}`;
}

async function connect(options: CliOptions): Promise<number> {
  const { config, logger } = resolveConfig(options);
  const interrupt: InterruptHook = { handler: () => undefined };
  const session = createHostSession(config, {
    transportFactory: createSerialTransport,
    sampler: new OsTelemetrySampler(),
    keySource: createKeySource(interrupt),
    logger,
  });
  return runUntilInterrupted(session, logger, options.port ?? config.connection.port, interrupt);
}

async function simulate(options: CliOptions): Promise<number> {
  const { config, logger } = resolveConfig(options);
  const deviceLogger = logger.child('device');
  const interrupt: InterruptHook = { handler: () => undefined };
  let lastState = '';
  const transport = new VirtualDeviceTransport({
    logger: deviceLogger,
    compositor: {
      draw(frame) {
        const label = `${frame.state}${frame.streak ? '+STREAK' : ''}`;
        if (label !== lastState) {
          lastState = label;
          deviceLogger.info(describeFrame(frame));
        } else {
          deviceLogger.debug(describeFrame(frame));
        }
      },
    },
  });
  const session = createHostSession(
    { ...config, connection: { ...config.connection, settleMs: 0, autoReconnect: false } },
    {
      transportFactory: () => transport,
      sampler: new OsTelemetrySampler(),
      keySource: createKeySource(interrupt),
      logger,
    }
  );
  return runUntilInterrupted(session, logger, transport.path, interrupt);
}

export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    console.error(getErrorMessage(err));
    console.error(USAGE);
    return 2;
  }
  if (options.help || options.command === undefined) {
    console.log(USAGE);
    return options.help ? 0 : 2;
  }

  try {
    switch (options.command) {
      case 'ports':
        return await listPorts();
      case 'connect':
        return await connect(options);
      case 'simulate':
        return await simulate(options);
      default:
        console.error(`Unknown command "${options.command}"`);
        console.error(USAGE);
        return 2;
    }
  } catch (err) {
    const prefix = isPawlinkError(err) ? `[pawlink] ${err.code}: ` : '[pawlink] ';
    console.error(`${prefix}${getErrorMessage(err)}`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(getErrorMessage(err));
      process.exitCode = 1;
    }
  );
}
