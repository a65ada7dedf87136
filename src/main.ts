import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { ResponseInterceptor } from './common/response.interceptor';
import { LoggingInterceptor } from './common/logging.interceptor';
import { HttpExceptionFilter } from './common/http-exception.filter';
import { I18nService } from './i18n/i18n.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  app.useGlobalInterceptors(new LoggingInterceptor(), new ResponseInterceptor());

  // Exception filter translates { key, vars } bodies
  app.useGlobalFilters(new HttpExceptionFilter(app.get(I18nService)));

  const config = app.get(ConfigService);
  const port = config.get<number>('app.port', 3000);
  await app.listen(port);
  new Logger('Bootstrap').log(
    `Stock ledger listening on ${port} (${config.get<string>('app.environment', 'development')})`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error);
  process.exit(1);
});
