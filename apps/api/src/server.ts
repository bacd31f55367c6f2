import { createServer } from 'http';
import { applySchema, closePool, getPool } from '@fleet-alerts/adapters';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import { createContextFromConfig } from './context.js';

async function main() {
  const config = loadConfig();
  const ctx = createContextFromConfig(config);

  if (config.storeDriver === 'postgres') {
    await getPool().query('SELECT 1');
    await applySchema();
    console.log('[server] database connected, schema applied');
  } else {
    console.warn('[server] STORE_DRIVER=memory; alerts and rules are lost on restart');
  }

  if (config.loadDefaultRules) {
    await ctx.rules.loadDefaultRules();
  }

  if (config.autoCloseEnabled) {
    ctx.scheduler.start();
  }

  const app = buildApp(ctx, { corsOrigin: config.corsOrigin });
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    ctx.scheduler.stop();
    httpServer.close();
    if (config.storeDriver === 'postgres') await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
