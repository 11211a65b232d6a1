import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';
import { HttpExceptionFilter } from './common/exceptions/http-exception.filter';
import { Logger, LoggingInterceptor } from './common/interceptors/logging.interceptor';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());
  app.setGlobalPrefix('api/v1');
  app.enableShutdownHooks();

  const corsEnv = configService.getOptional('CORS_ORIGIN');
  const allowedOrigins = corsEnv ? corsEnv.split(',').map((s) => s.trim()) : ['http://localhost:8080'];
  app.enableCors({
    origin: (origin, callback) => {
      // non-browser clients send no origin
      if (!origin || allowedOrigins.includes(origin)) return callback(null, true);
      return callback(new Error('Not allowed by CORS'));
    },
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE,OPTIONS',
    credentials: true,
  });

  const config = new DocumentBuilder()
    .setTitle('Project Evaluation API')
    .setDescription('Document submissions, committee marking and final results for final-year projects')
    .setVersion('1.0')
    .addBearerAuth()
    .build();
  SwaggerModule.setup('api/docs', app, SwaggerModule.createDocument(app, config));

  const port = configService.getNumber('PORT', 5000);
  const host = configService.getOptional('HOST') || '0.0.0.0';
  await app.listen(port, host);
  Logger.log(`API listening on http://localhost:${port}/api/v1`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start', error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
