#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { GATEWAY_CONFIG, GatewayConfig, parseLogLevels } from './config/gateway.config';

const mark = (provided: boolean) => (provided ? '✅' : '❌');

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
    logger: parseLogLevels(process.env.LOG_LEVEL),
  });
  const config = app.get<GatewayConfig>(GATEWAY_CONFIG);

  configureApp(app, config);

  const isProduction = process.env.NODE_ENV === 'production';

  if (!isProduction) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Sentinel Chat Gateway')
        .setDescription('OpenAI-compatible chat completions over the anonymous web conversation backend')
        .setVersion('0.6.0')
        .addBearerAuth()
        .build(),
    );
    SwaggerModule.setup('api/docs', app, document);
  }

  await app.listen(config.port, '0.0.0.0');

  console.log(`\n🚀 Sentinel Chat Gateway running on http://localhost:${config.port}`);
  console.log(`   Local:  http://127.0.0.1:${config.port}/v1/chat/completions`);
  console.log('\n   Environment variables:');
  console.log(`   ${mark(config.provided.port)} PORT`);
  console.log(`   ${mark(config.provided.proxy)} ALL_PROXY`);
  console.log(`   ${mark(config.provided.authorization)} AUTHORIZATION`);
  if (!isProduction) {
    console.log(`\n📚 API Documentation: http://localhost:${config.port}/api/docs\n`);
  }

  const logger = new Logger('Shutdown');
  let closing = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.log(`${signal} received, draining in-flight requests`);

    const timer = setTimeout(() => {
      logger.warn(`Grace period of ${config.shutdownGraceMs}ms elapsed, exiting`);
      process.exit(1);
    }, config.shutdownGraceMs);
    timer.unref();

    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

bootstrap().catch((err: unknown) => {
  console.error(`Failed to start: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
