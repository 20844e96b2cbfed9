import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import {
  APP_CONFIG,
  AppConfig,
  validateConfiguration,
} from './config/configuration';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService).getOrThrow<AppConfig>(APP_CONFIG);

  // On démarre quand même : l'utilisateur peut choisir un autre fournisseur
  for (const error of validateConfiguration(config)) {
    logger.warn(`Erreur de configuration: ${error}`);
  }

  app.enableCors({
    origin: '*',
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE,OPTIONS',
    credentials: true,
  });
  app.enableShutdownHooks();

  await app.listen(config.port);
  logger.log(`${config.appTitle} démarré sur le port ${config.port}`);
}
void bootstrap();
