import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  app.enableCors();
  app.enableShutdownHooks();

  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const { name, version } = configService.get('app', { infer: true });

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle(name)
      .setDescription('Heartbeats, activity reports and command queues for a fleet of remote agents')
      .setVersion(version)
      .addApiKey({ type: 'apiKey', name: 'x-api-key', in: 'header' }, 'api-key')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  const port = configService.get('port', { infer: true });
  await app.listen(port, '0.0.0.0');

  logger.log(`${name} starting`);
  logger.log(`Listening on port ${port}`);
  if (!configService.get('auth', { infer: true }).enforce) {
    logger.warn('API key is not enforced on control routes (set AUTH_ENFORCE=true to require it)');
  }
}

bootstrap().catch((error) => {
  new Logger('Bootstrap').error('Failed to start', error);
  process.exit(1);
});
