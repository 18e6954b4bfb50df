import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('port', 3001);
  await app.listen(port);

  new Logger('Bootstrap').log(
    `Media pipeline worker ${configService.get<string>('worker.id')} listening on port ${port}`
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Fatal error during startup: ${error instanceof Error ? error.stack : String(error)}`
  );
  process.exit(1);
});
