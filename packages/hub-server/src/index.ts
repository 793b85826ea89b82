import { createApp } from './app.js';
import { ConfigLoader, Sections, Keys, configEnvFromNodeEnv } from './config/index.js';
import { createContextFromConfig } from './context.js';
import { createLogger, setLogLevel } from './log.js';
import { createApiLimiter } from './middleware/rateLimiter.js';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const config = new ConfigLoader(configEnvFromNodeEnv(nodeEnv));
setLogLevel(config.get(Sections.LOG, Keys.LEVEL, 'info'));

const log = createLogger('server');

const port = config.get(Sections.SERVER, Keys.PORT, 3000);
const host = config.get(Sections.SERVER, Keys.HOST, '0.0.0.0');
const corsOrigins = config.get(Sections.SERVER, Keys.CORS_ORIGINS, '*');

async function main(): Promise<void> {
  const ctx = await createContextFromConfig(config);
  const app = createApp(ctx, { corsOrigins, limiter: createApiLimiter(config) });

  const server = app.listen(port, host, () => {
    log.info(`Freigent hub running on ${host}:${port} [${nodeEnv}]`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      ctx.store.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error('store close failed', err);
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  log.error('startup failed', err);
  process.exit(1);
});
