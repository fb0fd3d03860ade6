import { Module } from '@nestjs/common';
import { GeocodingService } from './geocoding.service';
import { WeatherService } from './weather.service';

@Module({
  providers: [GeocodingService, WeatherService],
  exports: [GeocodingService, WeatherService],
})
export class WeatherModule {}
