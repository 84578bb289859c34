import { loadConfig } from './config';
import { createPool, PgDocumentStore, poolConnector } from './database';
import { createApp } from './server';

const config = loadConfig();

// No DATABASE_URL means no store; /test reports it and store-backed routes answer 500
const pool = config.databaseUrl ? createPool(config) : null;
const store = pool ? new PgDocumentStore(poolConnector(pool)) : null;

pool?.on('error', (error) => {
  console.error('Idle database client error:', error.message);
});

const app = createApp({ store, config });

// Start the server
const server = app.listen(config.port, '0.0.0.0', () => {
  console.log(`Server running on port ${config.port} and listening on 0.0.0.0`);
  console.log(`Environment: ${config.nodeEnv}`);
  console.log(`Database connection: ${config.databaseUrl ? 'Using DATABASE_URL' : 'Not configured'}`);
});

const shutdown = (signal: string) => {
  console.log(`${signal} received, shutting down`);
  server.close(() => {
    if (pool === null) {
      process.exit(0);
    }
    pool.end().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error closing database pool:', error);
        process.exit(1);
      }
    );
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
