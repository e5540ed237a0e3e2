#!/usr/bin/env node
import process from 'node:process';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import {
  bindStopSignals,
  createRuntime,
  loadRuntimeConfig,
  runRuntime,
  type SignalBinding
} from './app.js';
import type { FramedumpConfig } from './config/index.js';
import { ConfigError, describeError } from './errors.js';
import { FramePublisher } from './publisher.js';
import type { EndpointConfig, PublisherTransport, SubscriberTransportFactory } from './transport/index.js';
import { isAnnotationRecord } from './wire/codec.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDeps = {
  loadConfig?: () => FramedumpConfig;
  transportFactory?: SubscriberTransportFactory;
  openPublisher?: (endpoints: EndpointConfig) => Promise<PublisherTransport>;
  /** Stops `dump` / `view`; SIGINT and SIGTERM are used when absent. */
  signal?: AbortSignal;
};

type ParsedArgs = {
  positionals: string[];
  options: Map<string, string | true>;
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const USAGE_LINES = [
  'Usage: framedump <command> [options]',
  '',
  'Commands:',
  '  dump            Subscribe and persist images and log records',
  '  view            Subscribe and hand frames to the render loop',
  '  check-config    Validate the configuration and print a summary',
  '  send-log <json> Publish one log frame (--connect|--bind <endpoint>, --source <id>)',
  '  help            Show this message',
  '',
  'Options:',
  '  --log-level <level>  Override the configured log level',
  '  --quiet              Do not echo log records to stdout'
];

const VALUE_OPTIONS = new Set(['--log-level', '--connect', '--bind', '--source', '--settle-ms']);

function parseArgs(args: string[]): ParsedArgs {
  const positionals: string[] = [];
  const options = new Map<string, string | true>();
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }
    const [name, inlineValue] = token.split('=', 2);
    if (inlineValue !== undefined) {
      options.set(name, inlineValue);
    } else if (VALUE_OPTIONS.has(name)) {
      const next = args[index + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`Missing value for ${name}`);
      }
      options.set(name, next);
      index += 1;
    } else {
      options.set(name, true);
    }
  }
  return { positionals, options };
}

function stringOption(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.options.get(name);
  return typeof value === 'string' ? value : undefined;
}

function writeConfigError(error: ConfigError, io: CliIo) {
  io.stderr.write(`${error.message}\n`);
  for (const issue of error.issues) {
    io.stderr.write(`  - ${issue}\n`);
  }
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  deps: CliDeps = {}
): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n`);
    return 1;
  }

  const level = stringOption(parsed, '--log-level');
  if (level !== undefined) {
    if (!getAvailableLogLevels().includes(level.toLowerCase())) {
      io.stderr.write(
        `Unknown log level "${level}" (available: ${getAvailableLogLevels().join(', ')})\n`
      );
      return 1;
    }
    setLogLevel(level);
  }

  const command = parsed.positionals[0] ?? 'help';

  switch (command) {
    case 'dump':
    case 'view': {
      return runSubscriber(command, parsed, io, deps);
    }
    case 'check-config': {
      return checkConfig(io, deps);
    }
    case 'send-log': {
      return sendLog(parsed, io, deps);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
    }
  }
}

function loadConfig(io: CliIo, deps: CliDeps): FramedumpConfig | null {
  try {
    return (deps.loadConfig ?? loadRuntimeConfig)();
  } catch (error) {
    if (error instanceof ConfigError) {
      writeConfigError(error, io);
      return null;
    }
    throw error;
  }
}

async function runSubscriber(
  mode: 'dump' | 'view',
  parsed: ParsedArgs,
  io: CliIo,
  deps: CliDeps
): Promise<number> {
  const loaded = loadConfig(io, deps);
  if (!loaded) {
    return 1;
  }

  const runtimeConfig: FramedumpConfig = {
    ...loaded,
    quiet: loaded.quiet || parsed.options.has('--quiet'),
    persistence: mode === 'dump' ? { ...loaded.persistence, enabled: true } : loaded.persistence,
    display: mode === 'view' ? { ...loaded.display, enabled: true } : loaded.display
  };

  let binding: SignalBinding | null = null;
  let signal: AbortSignal;
  if (deps.signal) {
    signal = deps.signal;
  } else {
    binding = bindStopSignals();
    signal = binding.controller.signal;
  }

  try {
    const runtime = await createRuntime({
      config: runtimeConfig,
      transportFactory: deps.transportFactory,
      echo: io.stdout
    });
    await runRuntime(runtime, signal);
  } catch (error) {
    if (error instanceof ConfigError) {
      writeConfigError(error, io);
      return 1;
    }
    logger.error({ err: error }, `framedump ${mode} failed`);
    io.stderr.write(`framedump ${mode} failed: ${describeError(error)}\n`);
    return 1;
  } finally {
    binding?.dispose();
  }

  const { messages, persistence } = metrics.snapshot();
  io.stderr.write(
    `Received ${messages.received}, dropped ${messages.dropped}, ` +
      `images ${persistence.images}, log records ${persistence.logRecords}\n`
  );
  return 0;
}

function checkConfig(io: CliIo, deps: CliDeps): number {
  const loaded = loadConfig(io, deps);
  if (!loaded) {
    return 1;
  }

  const { ingress, output, persistence, display } = loaded;
  const mode = ingress.bind.length > 0 ? 'bind' : 'connect';
  const endpoints = mode === 'bind' ? ingress.bind : ingress.connect;
  const lines = [
    'Configuration valid',
    `ingress: ${mode} ${endpoints.join(', ')}`,
    persistence.enabled
      ? `persistence: enabled (images: ${output.imageDir}, logs: ${output.logDir})`
      : 'persistence: disabled',
    display.enabled ? `display: enabled (queue: ${display.queueCapacity})` : 'display: disabled'
  ];
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

async function openZmqPublisher(endpoints: EndpointConfig): Promise<PublisherTransport> {
  const { ZmqPublisherTransport } = await import('./transport/zmq.js');
  return ZmqPublisherTransport.open(endpoints);
}

async function sendLog(parsed: ParsedArgs, io: CliIo, deps: CliDeps): Promise<number> {
  const payload = parsed.positionals[1];
  const connect = stringOption(parsed, '--connect');
  const bind = stringOption(parsed, '--bind');
  const sourceId = stringOption(parsed, '--source') ?? 'framedump';

  if (!payload) {
    io.stderr.write('send-log requires a JSON annotation\n');
    return 1;
  }
  if ((connect === undefined) === (bind === undefined)) {
    io.stderr.write('send-log requires exactly one of --connect or --bind\n');
    return 1;
  }

  let annotation: unknown;
  try {
    annotation = JSON.parse(payload);
  } catch (error) {
    io.stderr.write(`Invalid JSON annotation: ${describeError(error)}\n`);
    return 1;
  }
  if (!isAnnotationRecord(annotation)) {
    io.stderr.write('Annotation must be a JSON object\n');
    return 1;
  }

  const settleMs = Number(stringOption(parsed, '--settle-ms') ?? '200');
  const transport = await (deps.openPublisher ?? openZmqPublisher)({
    connect: connect === undefined ? [] : [connect],
    bind: bind === undefined ? [] : [bind]
  });
  const publisher = new FramePublisher({ transport, sourceId });
  try {
    // PUB sockets drop messages sent before subscribers finish joining.
    if (Number.isFinite(settleMs) && settleMs > 0) {
      await delay(settleMs);
    }
    await publisher.publishLog(annotation);
  } catch (error) {
    io.stderr.write(`send-log failed: ${describeError(error)}\n`);
    return 1;
  } finally {
    publisher.close();
  }

  io.stdout.write(`Published log frame from ${sourceId}\n`);
  return 0;
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'framedump CLI failed');
      process.exit(1);
    }
  );
}
