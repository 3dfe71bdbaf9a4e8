import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from '@/app.module';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  logger.log(`Servidor ouvindo na porta ${port}`);
}

bootstrap().catch((error) => {
  logger.error(`Erro crítico: ${error instanceof Error ? error.stack : String(error)}`);
  process.exit(1);
});
