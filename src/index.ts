import 'dotenv/config';
import { loadConfig } from './config.js';
import { buildServer } from './server.js';
import { createGenerationServices } from './services.js';
import { logApplicationEvent, logSafeEnvironmentInfo, logSecretStatus } from './util/safe-logging.js';

const start = async () => {
  logApplicationEvent('web-api', 'starting');
  const config = loadConfig();
  logSafeEnvironmentInfo(config);
  logSecretStatus('GAMESYNTH_API_KEY', config.server.apiKey);
  logSecretStatus('GAMESYNTH_FALLBACK_API_KEY', config.fallback.apiKey);

  if (!config.server.apiKey) {
    throw new Error('GAMESYNTH_API_KEY must be set to start the API server');
  }

  const services = createGenerationServices(config);
  const server = await buildServer({ apiKey: config.server.apiKey, services });

  const { port, host } = config.server;
  try {
    await server.listen({ port, host });
    logApplicationEvent('web-api', 'started', { port, host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
};

start().catch((error: unknown) => {
  console.error('[web-api] Failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});
