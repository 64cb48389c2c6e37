import { INestApplication } from '@nestjs/common';
import { json } from 'express';
import helmet from 'helmet';
import { GatewayConfig } from './config/gateway.config';
import { GatewayExceptionFilter } from './common/filters/gateway-exception.filter';
import { bodyParseErrorHandler } from './common/middleware/body-parse-error.middleware';
import { corsHeaders } from './common/middleware/cors-headers.middleware';
import { requestLogger } from './common/middleware/request-logger.middleware';

/**
 * Global middleware shared by the server and the e2e tests. The app must be
 * created with `bodyParser: false` so the JSON parser below is the only one.
 */
export function configureApp(app: INestApplication, config: GatewayConfig): INestApplication {
  app.use(corsHeaders);
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));
  app.use(requestLogger);

  // clients do not always send a JSON content type, parse every body as JSON
  app.use(json({ limit: config.bodyLimit, type: () => true }));
  app.use(bodyParseErrorHandler);

  app.useGlobalFilters(new GatewayExceptionFilter());
  return app;
}
