import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { HealthController } from './health/health.controller';
import { SourcesModule } from './sources/sources.module';
import { MetricsModule } from './metrics/metrics.module';
import { ClusteringModule } from './clustering/clustering.module';
import { WeatherModule } from './weather/weather.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    SourcesModule,
    MetricsModule,
    ClusteringModule,
    WeatherModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
