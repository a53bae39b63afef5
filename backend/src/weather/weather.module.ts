import { Module } from '@nestjs/common';
import { SourcesModule } from '../sources/sources.module';
import { WeatherClient } from './weather.client';
import { WeatherController } from './weather.controller';
import { WeatherService } from './weather.service';

/**
 * WeatherModule
 *
 * Components:
 * - WeatherClient: Open-Meteo daily forecast
 * - WeatherService: freeze/thaw status and freeze-event vacuum drops
 * - WeatherController: /weather endpoints
 */
@Module({
  imports: [SourcesModule],
  controllers: [WeatherController],
  providers: [WeatherClient, WeatherService],
})
export class WeatherModule {}
