import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { requestIdMiddleware } from './common/middleware/request-id.middleware';
import { DomainValidationPipe } from './common/pipes/domain-validation.pipe';
import { validateEnv } from './config/validation';
import { DatabaseModule } from './database/database.module';
import { DetectionsModule } from './modules/detections/detections.module';
import { ExportModule } from './modules/export/export.module';
import { HealthModule } from './modules/health/health.module';
import { ScanConfigModule } from './modules/scan-config/scan-config.module';
import { ScannerModule } from './modules/scanner/scanner.module';
import { StatusModule } from './modules/status/status.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv
    }),
    ScanConfigModule,
    DatabaseModule,
    HealthModule,
    DetectionsModule,
    ExportModule,
    ScannerModule,
    StatusModule
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter
    },
    {
      provide: APP_PIPE,
      useClass: DomainValidationPipe
    }
  ]
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(requestIdMiddleware).forRoutes('*');
  }
}
