import './config/loadEnv.js';
import { createServer } from 'http';
import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import { createAwsClients } from './lib/aws.js';
import { createRepositoryContext } from './repositories/index.js';
import { setupShutdownHandlers } from './server/shutdown.js';
import { createServiceContext } from './services/index.js';
import { createImageStorage } from './storage/index.js';
import { errorMeta, logger } from './utils/logger.js';

function startServer() {
  const config = loadConfig();
  const clients = createAwsClients(config);

  const repos = createRepositoryContext(clients.dynamo, config);
  const storage = createImageStorage(clients.s3, config);
  const services = createServiceContext(repos, storage, config);

  const app = createApp({ services, corsAllowOrigin: config.corsAllowOrigin, accessLog: config.httpLog });
  const httpServer = createServer(app);

  httpServer.keepAliveTimeout = 65000; // 65 seconds
  httpServer.headersTimeout = 66000; // must be > keepAliveTimeout

  setupShutdownHandlers({
    httpServer,
    shutdownTimeoutMs: 20000,
    httpDrainTimeoutMs: 10000,
    destroyClients: () => {
      clients.s3.destroy();
      clients.dynamo.destroy();
    },
  });

  httpServer.listen(config.port, () => {
    logger.info('server.started', {
      port: config.port,
      env: config.nodeEnv,
      region: config.aws.region,
      bucket: config.s3.bucket,
      table: config.dynamodb.tableName,
      endpoint: config.aws.endpoint ?? null,
    });
  });
}

try {
  startServer();
} catch (error) {
  logger.error('server.start_failed', errorMeta(error));
  process.exit(1);
}
