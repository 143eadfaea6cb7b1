/**
 * Server entry point
 *
 * Reads configuration, wires the session registry to the HTTP API and shuts
 * everything down on SIGINT/SIGTERM.
 */

import { CollectionRateLimiter, SessionRegistry } from './application';
import { ICollectionImporter } from './domain/loading';
import { loadServerConfig, ServerConfig } from './infrastructure/config';
import { createLogger, setLogLevel } from './infrastructure/logging';
import { ClockAudioOutput } from './infrastructure/playback';
import { DirectLinkResolver } from './infrastructure/resolution';
import { HTTPServer, NoticeBoard } from './infrastructure/web';

export interface ServerHandle {
  readonly config: ServerConfig;
  readonly registry: SessionRegistry;
  readonly httpServer: HTTPServer;
  shutdown(): Promise<void>;
}

/**
 * Wire the shared resolver and rate limiter into a session registry.
 *
 * Only identifiers one of `importers` recognises as a collection are rate
 * limited or announced, so the `COLLECTION_RATE_LIMIT_*` and
 * `LONG_LOAD_ANNOUNCE_THRESHOLD` settings have no effect without one.
 */
export function createSessionRegistry(
  config: ServerConfig,
  importers: readonly ICollectionImporter[] = []
): { registry: SessionRegistry; rateLimiter: CollectionRateLimiter } {
  if (importers.length === 0) {
    createLogger('main').warn('No collection importer configured: collection rate limits and announcements are off');
  }

  const rateLimiter = new CollectionRateLimiter(importers, {
    maxItems: config.collectionRateLimitItems,
    windowMs: config.collectionRateLimitWindowMs
  });

  const registry = new SessionRegistry({
    resolver: new DirectLinkResolver(),
    rateLimiter,
    createOutput: () => new ClockAudioOutput(),
    loaderOptions: {
      queueTrackLimit: config.queueTrackLimit,
      announceThreshold: config.longLoadAnnounceThreshold,
      showUpstreamBlockWarning: config.showUpstreamBlockWarning
    }
  });

  return { registry, rateLimiter };
}

/**
 * Build and start the server
 */
export async function startServer(
  config: ServerConfig = loadServerConfig(),
  importers: readonly ICollectionImporter[] = []
): Promise<ServerHandle> {
  setLogLevel(config.logLevel);
  const log = createLogger('main');

  const { registry, rateLimiter } = createSessionRegistry(config, importers);

  const httpServer = new HTTPServer({
    port: config.port,
    host: config.host,
    logger: config.httpLogger,
    logLevel: config.logLevel
  });
  await httpServer.initialize({
    registry,
    notices: new NoticeBoard(config.noticeHistorySize),
    rateLimiter
  });
  await httpServer.start();

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      log.info('Shutting down');
      await httpServer.stop();
      await registry.shutdown();
    })();
    return stopping;
  };

  log.info({ port: config.port, queueTrackLimit: config.queueTrackLimit }, 'Server ready');
  return { config, registry, httpServer, shutdown };
}

function setupGracefulShutdown(handle: ServerHandle): void {
  const log = createLogger('main');

  const shutdownHandler = (signal: string): void => {
    log.info({ signal }, 'Received signal, shutting down gracefully');
    handle.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdownHandler('SIGINT'));
  process.on('SIGTERM', () => shutdownHandler('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    log.error({ err: reason }, 'Unhandled rejection');
  });
}

if (require.main === module) {
  startServer()
    .then(setupGracefulShutdown)
    .catch((error: unknown) => {
      createLogger('main').fatal({ err: error }, 'Server startup failed');
      process.exit(1);
    });
}
