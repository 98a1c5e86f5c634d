import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { IngestionModule } from './ingestion/ingestion.module';
import { AnalysisModule } from './analysis/analysis.module';
import { AlertsModule } from './alerts/alerts.module';
import { ProcessingModule } from './processing/processing.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    IngestionModule,
    AnalysisModule,
    AlertsModule,
    ProcessingModule,
    HealthModule,
  ],
})
export class AppModule {}
