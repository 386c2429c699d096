import { createApp } from './app';
import { loadConfig } from './config';
import { createServices } from './services';
import logger from './util/logger';

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

const stopCleanup = services.synthesizer.startCleanup(config.speech.cleanupIntervalSeconds);

services.synthesizer.sweep().catch((error: unknown) => {
  logger.error({ err: error }, 'Initial speech artifact sweep failed.');
});

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, env: config.env }, 'Server listening.');
});

const shutdown = (signal: string): void => {
  logger.info({ signal }, 'Shutting down.');
  stopCleanup();
  server.close(() => process.exit(0));
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;
