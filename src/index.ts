import Fastify from 'fastify';
import pino from 'pino';
import type { Logger } from 'pino';

import {
  CollectorPipeline,
  DispatchLoop,
  EventBuffer,
  OutageMonitor,
  ShutdownCoordinator,
  Warmup,
  createBackoffPolicy,
  createBadRowFactory,
  createHealthReporter,
} from './application/index.js';
import type { BadRowReason, Destination, Payload } from './domain/index.js';
import {
  createSink,
  loadConfig,
  needsRedis,
  redisPlugin,
} from './infrastructure/index.js';
import type { CollectorConfig, SinkClients, SinkConfig } from './infrastructure/index.js';
import { collectorRoutes, healthRoutes, WARMUP_HEADER } from './interfaces/http/index.js';

const ARTIFACT = 'beacon-relay';
const VERSION = '0.1.0';

function createBuffer(destination: Destination, sink: SinkConfig, config: CollectorConfig, log: Logger): EventBuffer {
  return new EventBuffer(
    {
      destination,
      maxBatchBytes: sink.maxBatchBytes,
      maxBatchRecords: sink.maxBatchRecords,
      timeLimitMs: sink.timeLimitMs,
      maxBufferedBytes: config.buffer.maxBufferedBytes,
    },
    log.child({ component: 'buffer', destination }),
  );
}

/**
 * Bootstrap the collector.
 *
 * Order:
 * 1) Configuration and logger
 * 2) Backend client and sinks
 * 3) Buffers, pipeline, outage monitor, dispatch loops
 * 4) HTTP routes, listen()
 * 5) Warmup, signal handlers
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  const fastify = Fastify({ loggerInstance: log });

  // --------------------------------------------------
  // Sinks
  // --------------------------------------------------

  const clients: SinkClients = {};
  if (needsRedis([config.good.type, config.bad.type])) {
    await fastify.register(redisPlugin, {
      url: config.redis.url,
      commandTimeoutMs: config.redis.commandTimeoutMs,
    });
    clients.redis = fastify.redis;
  }

  const sinkSpec = (destination: Destination, sink: SinkConfig) => ({
    sink: destination,
    type: sink.type,
    target: sink.name,
    limits: {
      maxBatchBytes: sink.maxBatchBytes,
      maxBatchRecords: sink.maxBatchRecords,
      maxRecordBytes: sink.maxRecordBytes,
    },
    streamMaxLen: sink.streamMaxLen,
  });

  const goodSink = createSink(sinkSpec('good', config.good), clients);
  const badSink = createSink(sinkSpec('bad', config.bad), clients);

  log.info(
    {
      good: { type: config.good.type, target: config.good.name },
      bad: { type: config.bad.type, target: config.bad.name },
    },
    'Sinks configured',
  );

  // --------------------------------------------------
  // Buffering and delivery
  // --------------------------------------------------

  const goodBuffer = createBuffer('good', config.good, config, log);
  const badBuffer = createBuffer('bad', config.bad, config, log);

  const pipeline = new CollectorPipeline({
    good: goodBuffer,
    bad: badBuffer,
    maxRecordBytes: config.good.maxRecordBytes,
    badRows: createBadRowFactory({
      artifact: ARTIFACT,
      version: VERSION,
      maxRecordBytes: config.bad.maxRecordBytes,
    }),
    log: log.child({ component: 'pipeline' }),
  });

  const monitor = new OutageMonitor(
    [goodSink, badSink],
    {
      unhealthyThreshold: config.outage.unhealthyThreshold,
      probeIntervalMs: config.outage.probeIntervalMs,
    },
    log.child({ component: 'outage-monitor' }),
  );

  const policy = createBackoffPolicy(config.backoff);

  let coordinator: ShutdownCoordinator | null = null;
  const onLoopFailure = (): void => {
    if (!coordinator) {
      process.exit(1);
    }
    coordinator
      .shutdown('dispatch-failure')
      .then(() => process.exit(1))
      .catch((err: unknown) => {
        log.fatal({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };

  const goodLoop = new DispatchLoop({
    buffer: goodBuffer,
    sink: goodSink,
    monitor,
    policy,
    log,
    divert: (payloads, reason, message) => pipeline.divertToBad(payloads, reason, message),
    onFatal: onLoopFailure,
  });

  // Bad rows that cannot be delivered are terminal
  const dropBadRows = (payloads: readonly Payload[], reason: BadRowReason, message: string): void => {
    log.error(
      { destination: 'bad', reason, records: payloads.length, message },
      'Bad rows dropped after delivery failure',
    );
  };

  const badLoop = new DispatchLoop({
    buffer: badBuffer,
    sink: badSink,
    monitor,
    policy,
    log,
    divert: dropBadRows,
    onFatal: onLoopFailure,
  });

  const warmup = new Warmup(config.warmup, log.child({ component: 'warmup' }));

  const health = createHealthReporter({
    readiness: warmup,
    monitor,
    buffers: [goodBuffer, badBuffer],
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(collectorRoutes, {
    pipeline,
    payload: {
      collector: `${ARTIFACT}-${VERSION}`,
      ipPartitionKey: config.collector.ipPartitionKey,
      redactHeaders: config.collector.redactHeaders,
    },
  });
  await fastify.register(healthRoutes, { health });

  // --------------------------------------------------
  // Start
  // --------------------------------------------------

  if (config.outage.startupCheck) {
    await monitor.checkAtStartup();
  }

  goodLoop.start();
  badLoop.start();

  const address = await fastify.listen({
    host: config.http.host,
    port: config.http.port,
  });
  log.info({ address }, `REST interface bound to ${config.http.host}:${config.http.port}`);

  const shutdown = new ShutdownCoordinator(config.shutdown, {
    stopIngress: () => pipeline.stopIngress(),
    cancelWarmup: () => warmup.cancel(),
    stopProbes: () => monitor.stop(),
    loops: [goodLoop, badLoop],
    closeResources: () => fastify.close(),
    log,
  });
  coordinator = shutdown;

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown
      .shutdown(signal)
      .then((result) => process.exit(result.outcome === 'clean' ? 0 : 1))
      .catch((err: unknown) => {
        log.fatal({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  // --------------------------------------------------
  // Warmup (after listen)
  // --------------------------------------------------

  const trackUrl = `${address}/api/v1/track`;

  warmup
    .run(async (attempt) => {
      const response = await fetch(trackUrl, {
        method: 'POST',
        headers: { 'content-type': 'application/json', [WARMUP_HEADER]: String(attempt) },
        body: JSON.stringify({ e: 'warmup', attempt }),
      });
      return response.status === 202;
    })
    .then((result) => {
      log.debug({ result }, 'Warmup finished');
    })
    .catch((err: unknown) => {
      log.error({ err }, 'Warmup crashed');
    });
}

main().catch((err: unknown) => {
  pino().fatal({ err }, 'Failed to start collector');
  process.exit(1);
});
