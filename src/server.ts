import { createServer } from 'node:http';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import path from 'node:path';
import { existsSync } from 'node:fs';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { logger } from './logger.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { loadEnvironment } from './utils/env.js';
import { displayHost } from './utils/network.js';
import { CaptureUnavailableError, errorMessage } from './errors.js';
import { CaptureSource } from './capture/captureSource.js';
import type { CaptureBackend } from './capture/captureSource.js';
import { FfmpegCaptureBackend } from './capture/ffmpegCapture.js';
import { formatDeviceTable, selectCaptureCandidates } from './capture/devices.js';
import { ClientRegistry } from './broadcast/clientRegistry.js';
import { BroadcastEngine } from './broadcast/broadcastEngine.js';
import { ConnectionAcceptor } from './ws/connectionAcceptor.js';
import { bytesPerBlock } from './types.js';
import type { AudioFormat, BroadcastStats, CaptureStatus } from './types.js';

export interface StreamInfo {
  sampleRate: number;
  channels: number;
  blockSize: number;
  bytesPerBlock: number;
  encoding: 's16le';
  wsPort: number;
  wsPath: string;
}

export function buildStreamInfo(format: AudioFormat, wsPort: number, wsPath: string): StreamInfo {
  return {
    sampleRate: format.sampleRate,
    channels: format.channels,
    blockSize: format.blockSize,
    bytesPerBlock: bytesPerBlock(format),
    encoding: 's16le',
    wsPort,
    wsPath,
  };
}

export interface HealthSource {
  clients: () => number;
  capture: () => CaptureStatus | null;
  stats: () => Readonly<BroadcastStats>;
}

export function createHealthHandler(source: HealthSource) {
  return (_req: express.Request, res: express.Response) => {
    const capture = source.capture();
    res.status(capture ? 200 : 503).json({
      status: capture ? 'ok' : 'stopped',
      time: new Date().toISOString(),
      clients: source.clients(),
      capture,
      stats: source.stats(),
    });
  };
}

export function parseAllowedOrigins(raw = process.env.ALLOWED_ORIGINS): string[] {
  if (!raw) return [];
  const list = raw
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
  return Array.from(new Set(list));
}

function isOriginAllowed(origin: string | undefined, allowed: string[]): boolean {
  if (!origin) return true; // same-origin page loads and tools like curl
  return allowed.includes(origin);
}

export function createHttpApp(options: {
  streamInfo: StreamInfo;
  health: HealthSource;
  staticDir?: string;
  allowedOrigins?: string[];
  requestLogging?: boolean;
}): express.Express {
  const app = express();
  const allowedOrigins = options.allowedOrigins ?? parseAllowedOrigins();

  app.use(
    '/api',
    cors({
      origin: (origin, callback) => {
        if (isOriginAllowed(origin ?? undefined, allowedOrigins)) {
          callback(null, true);
          return;
        }
        callback(new Error('Not allowed by CORS'));
      },
    })
  );
  app.use(helmet());
  app.use(
    helmet.contentSecurityPolicy({
      useDefaults: true,
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:'],
        // the audio socket lives on its own port
        connectSrc: ["'self'", 'ws:', 'wss:'],
        mediaSrc: ["'self'", 'blob:'],
        objectSrc: ["'none'"],
        baseUri: ["'self'"],
        frameAncestors: ["'self'"],
      },
    })
  );
  if (options.requestLogging ?? true) {
    app.use(morgan('dev'));
  }
  if (options.staticDir && existsSync(path.resolve(options.staticDir))) {
    app.use(express.static(path.resolve(options.staticDir)));
  }

  app.get('/healthz', createHealthHandler(options.health));

  app.get('/api/stream-info', (_req, res) => {
    res.json(options.streamInfo);
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ event: 'http_error', message: err.message });
    res.status(500).json({ message: err.message });
  });

  return app;
}

function listenHttp(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise<AddressInfo>((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      if (!address || typeof address !== 'object') {
        reject(new Error('http server did not report a TCP address'));
        return;
      }
      resolve(address);
    });
  });
}

function closeHttp(server: Server): Promise<void> {
  if (!server.listening) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeIdleConnections();
  });
}

export interface RunningServer {
  readonly httpAddress: AddressInfo;
  readonly wsAddress: AddressInfo;
  readonly registry: ClientRegistry;
  readonly engine: BroadcastEngine;
  /** Resolves once broadcasting stops after stop(); rejects with DeviceReadError if the device fails. */
  readonly finished: Promise<BroadcastStats>;
  stop(): Promise<void>;
}

/**
 * Opens the capture device, starts both listeners and the broadcast loop.
 * Rejects with CaptureUnavailableError when no device can be opened.
 */
export async function startBroadcastServer(
  config: AppConfig,
  options: { backend?: CaptureBackend; requestLogging?: boolean } = {}
): Promise<RunningServer> {
  const format: AudioFormat = {
    sampleRate: config.audio.sampleRate,
    channels: config.audio.channels,
    blockSize: config.audio.blockSize,
  };
  const backend =
    options.backend ??
    new FfmpegCaptureBackend({
      inputFormat: config.capture.inputFormat,
      ffmpegPath: config.capture.ffmpegPath,
      openTimeoutMs: config.capture.openTimeoutMs,
      channels: config.audio.channels,
    });
  const source = new CaptureSource(backend, {
    readTimeoutMs: config.capture.readTimeoutMs,
    maxQueuedBlocks: config.capture.maxQueuedBlocks,
  });

  const devices = await source.listDevices();
  if (devices.length === 0) {
    throw new CaptureUnavailableError(`no ${config.capture.inputFormat} audio devices found`);
  }
  logger.info({ event: 'capture_devices', count: devices.length, table: `\n${formatDeviceTable(devices)}` });

  const candidates = selectCaptureCandidates(devices, config.audio.deviceIndex);
  const session = await source.openFirst(candidates, format);

  const registry = new ClientRegistry();
  const acceptor = new ConnectionAcceptor(registry, {
    path: config.server.wsPath,
    closeTimeoutMs: config.delivery.closeTimeoutMs,
  });
  const engine = new BroadcastEngine(session, registry, {
    sendTimeoutMs: config.delivery.sendTimeoutMs,
    maxPendingBytes: config.delivery.maxPendingBytes,
  });

  let wsAddress: AddressInfo;
  let httpAddress: AddressInfo;
  let httpServer: Server;
  try {
    wsAddress = await acceptor.listen(config.server.wsPort, config.server.host);
    const app = createHttpApp({
      streamInfo: buildStreamInfo(format, wsAddress.port, config.server.wsPath),
      staticDir: config.server.staticDir,
      requestLogging: options.requestLogging,
      health: {
        clients: () => registry.size,
        stats: () => engine.stats,
        capture: () =>
          source.activeSession
            ? { deviceIndex: session.device.index, deviceName: session.device.name, mode: session.mode, format }
            : null,
      },
    });
    httpServer = createServer(app);
    httpAddress = await listenHttp(httpServer, config.server.httpPort, config.server.host);
  } catch (error) {
    await session.close();
    await acceptor.close();
    throw error;
  }

  const controller = new AbortController();
  const finished = engine.run(controller.signal);

  let stopping: Promise<void> | null = null;
  const stop = () => {
    if (!stopping) {
      stopping = (async () => {
        controller.abort();
        // a device failure is reported through `finished`, not through stop()
        await Promise.allSettled([finished]);
        await acceptor.close();
        await closeHttp(httpServer);
      })();
    }
    return stopping;
  };

  const host = displayHost(config.server.host);
  logger.info({
    event: 'server_started',
    page: `http://${host}:${httpAddress.port}`,
    stream: `ws://${host}:${wsAddress.port}${config.server.wsPath}`,
    ...format,
    bytesPerBlock: bytesPerBlock(format),
  });

  return { httpAddress, wsAddress, registry, engine, finished, stop };
}

async function bootstrap(): Promise<number> {
  loadEnvironment();
  const config = await loadConfig();
  logger.info({ event: 'config_loaded', audio: config.audio, server: config.server });

  const server = await startBroadcastServer(config);

  let signals = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    signals += 1;
    if (signals > 1) {
      logger.warn({ event: 'forced_exit', signal });
      process.exit(1);
    }
    logger.info({ event: 'shutdown_requested', signal });
    server.stop().catch((error) => {
      logger.error({ event: 'shutdown_failed', message: errorMessage(error) });
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  let exitCode = 0;
  try {
    const stats = await server.finished;
    logger.info({ event: 'broadcast_summary', ...stats });
  } catch (error) {
    logger.fatal({ event: 'capture_failed', message: errorMessage(error) });
    console.error(`Audio capture stopped: ${errorMessage(error)}. Restart the server to resume streaming.`);
    exitCode = 1;
  }
  await server.stop();
  logger.info({ event: 'server_stopped' });
  return exitCode;
}

if (process.env.NODE_ENV !== 'test') {
  bootstrap()
    .then((code) => process.exit(code))
    .catch((error) => {
      if (error instanceof CaptureUnavailableError) {
        console.error(`Could not start audio capture: ${error.message}`);
        for (const attempt of error.attempts) {
          console.error(`  - ${attempt.message}`);
        }
      } else {
        console.error(error);
      }
      process.exit(1);
    });
}
