// Entry point: configuration from the environment (and .env), then serve

import dotenv from 'dotenv';
import { loadStoreConfigFromEnv, logStoreConfig, makeStore } from 'hearth-storage';
import { HearthServer, loadServerConfigFromEnv } from './index';

dotenv.config();

async function main(): Promise<void> {
  const storeConfig = loadStoreConfigFromEnv();
  logStoreConfig(storeConfig);

  const server = new HearthServer(makeStore(storeConfig), loadServerConfigFromEnv());

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('❌ Shutdown failed:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
