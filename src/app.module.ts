// File overview:
// - Purpose: Root Nest module wiring configuration, auth, items and the admin/health controllers.
// - Reached from: `main.ts` NestFactory.create(AppModule) and `test/helpers/test-app.ts`.
// - Global providers: ValidationPipe, HttpExceptionFilter, TimeoutInterceptor; request logging middleware on all routes.
import { MiddlewareConsumer, Module, NestModule, ValidationPipe } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR, APP_PIPE } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { HealthController } from './controllers/health.controller';
import { AdminController } from './controllers/admin.controller';
import { ItemsModule } from './items/items.module';
import { AuthModule } from './auth/auth.module';
import { appConfig } from './config/app.config';
import { fileConfig } from './config/file.config';
import { validateEnvironment } from './config/env.validation';
import { HttpExceptionFilter } from './common/http-exception.filter';
import { TimeoutInterceptor } from './common/timeout.interceptor';
import { RequestLoggingMiddleware } from './common/request-logging.middleware';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, fileConfig],
      validate: validateEnvironment,
    }),
    AuthModule,
    ItemsModule,
  ],
  controllers: [HealthController, AdminController],
  providers: [
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({
        whitelist: true, // Strip properties that don't have decorators
        transform: true, // Turn payloads into DTO instances
      }),
    },
    { provide: APP_FILTER, useClass: HttpExceptionFilter },
    { provide: APP_INTERCEPTOR, useClass: TimeoutInterceptor },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestLoggingMiddleware).forRoutes('{*splat}');
  }
}
