import config from 'config';
import { fileURLToPath } from 'node:url';
import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { ensureOutputDirectories, validateConfig, type FramedumpConfig } from './config/index.js';
import { AnnotationWriter, resolveAnnotationFormat } from './persistence/annotationWriter.js';
import { ImageWriter } from './persistence/imageWriter.js';
import { LogRotationWindow } from './persistence/logWindow.js';
import { HandoffQueue } from './pipeline/handoffQueue.js';
import { RenderLoop, type FrameSink } from './pipeline/renderLoop.js';
import { LoggingFrameSink, SnapshotFrameSink } from './pipeline/sinks.js';
import { Subscriber, type PersistenceOptions } from './subscriber.js';
import type { SubscriberTransport, SubscriberTransportFactory } from './transport/index.js';
import type { Clock, DisplayItem } from './types.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const shutdownHooks: RegisteredHook[] = [];

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

/** Hooks run newest first; a failing hook does not stop the others. */
export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn({ err, hook: entry.name }, 'Shutdown hook failed');
      results.push({ name: entry.name, status: 'error', error: err });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  shutdownHooks.splice(0, shutdownHooks.length);
}

/** Reads the merged node-config tree and validates it. */
export function loadRuntimeConfig(): FramedumpConfig {
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return loaded;
}

export type RuntimeOptions = {
  config: FramedumpConfig;
  transportFactory?: SubscriberTransportFactory;
  /** Replaces the sink chosen from `display.snapshotDir`. */
  sink?: FrameSink;
  echo?: NodeJS.WritableStream;
  clock?: Clock;
  metrics?: MetricsRegistry;
};

export type Runtime = {
  config: FramedumpConfig;
  transport: SubscriberTransport;
  subscriber: Subscriber;
  queue: HandoffQueue<DisplayItem> | null;
  renderLoop: RenderLoop | null;
};

const openDefaultTransport: SubscriberTransportFactory = async options => {
  const { openZmqSubscriber } = await import('./transport/zmq.js');
  return openZmqSubscriber(options);
};

export async function createRuntime(options: RuntimeOptions): Promise<Runtime> {
  const runtimeConfig = options.config;
  const registry = options.metrics ?? metrics;
  ensureOutputDirectories(runtimeConfig);

  let persistence: PersistenceOptions | null = null;
  if (runtimeConfig.persistence.enabled) {
    const { output, persistence: settings } = runtimeConfig;
    persistence = {
      inhibitionSeconds: settings.inhibitionSeconds,
      imageWriter: new ImageWriter({
        directory: output.imageDir,
        encoding: settings.imageEncoding,
        jpegQuality: settings.jpegQuality,
        fileIdKey: output.fileIdKey,
        timezone: output.timezone,
        metrics: registry
      }),
      logWindow: new LogRotationWindow({
        directory: output.logDir,
        intervalSeconds: settings.logWindowSeconds,
        writer: new AnnotationWriter({
          format: resolveAnnotationFormat(settings.csvFields),
          flatten: settings.flatten
        }),
        timezone: output.timezone,
        metrics: registry
      })
    };
  }

  let queue: HandoffQueue<DisplayItem> | null = null;
  let renderLoop: RenderLoop | null = null;
  if (runtimeConfig.display.enabled) {
    queue = new HandoffQueue<DisplayItem>({
      capacity: runtimeConfig.display.queueCapacity,
      metrics: registry
    });
    const snapshotDir = runtimeConfig.display.snapshotDir;
    const sink =
      options.sink ?? (snapshotDir ? new SnapshotFrameSink(snapshotDir) : new LoggingFrameSink());
    renderLoop = new RenderLoop({
      queue,
      sink,
      refreshIntervalMs: runtimeConfig.display.refreshIntervalMs,
      metrics: registry
    });
  }

  const transport = await (options.transportFactory ?? openDefaultTransport)({
    ...runtimeConfig.ingress
  });

  const subscriber = new Subscriber({
    transport,
    persistence,
    display: queue,
    statsIntervalSeconds: runtimeConfig.stats.intervalSeconds,
    echo: runtimeConfig.quiet ? null : options.echo ?? process.stdout,
    clock: options.clock,
    metrics: registry
  });

  return { config: runtimeConfig, transport, subscriber, queue, renderLoop };
}

/**
 * Runs both loops until `signal` aborts or the transport fails. The render
 * loop is stopped and awaited once the subscriber loop has exited.
 */
export async function runRuntime(runtime: Runtime, signal: AbortSignal): Promise<void> {
  const renderController = new AbortController();
  const stopRender = () => renderController.abort();
  signal.addEventListener('abort', stopRender, { once: true });

  const rendering = runtime.renderLoop ? runtime.renderLoop.run(renderController.signal) : null;
  const unregister = registerShutdownHook('transport', () => {
    runtime.transport.close();
  });

  try {
    await runtime.subscriber.run(signal);
  } finally {
    signal.removeEventListener('abort', stopRender);
    renderController.abort();
    if (rendering) {
      await rendering;
    }
    // Frames still queued for display are discarded, not drained.
    runtime.queue?.clear();
    await runShutdownHooks({ reason: signal.aborted ? 'stop-requested' : 'subscriber-exit' });
    unregister();
  }
}

export type SignalBinding = {
  controller: AbortController;
  dispose: () => void;
};

/** SIGINT and SIGTERM abort the returned controller. */
export function bindStopSignals(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): SignalBinding {
  const controller = new AbortController();
  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Stop requested');
    controller.abort();
  };
  for (const signal of signals) {
    process.once(signal, handleSignal);
  }
  return {
    controller,
    dispose: () => {
      for (const signal of signals) {
        process.off(signal, handleSignal);
      }
    }
  };
}

export async function bootstrap(overrides: Partial<Omit<RuntimeOptions, 'config'>> = {}) {
  const runtimeConfig = loadRuntimeConfig();
  logger.info(
    {
      persistence: runtimeConfig.persistence.enabled,
      display: runtimeConfig.display.enabled
    },
    'framedump starting'
  );

  const runtime = await createRuntime({ ...overrides, config: runtimeConfig });
  const binding = bindStopSignals();
  try {
    await runRuntime(runtime, binding.controller.signal);
  } finally {
    binding.dispose();
  }
  logger.info({ metrics: metrics.snapshot().messages }, 'framedump stopped');
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap().catch(error => {
    logger.error({ err: error }, 'Bootstrap failed');
    process.exitCode = 1;
  });
}
