import { Module } from '@nestjs/common';
import { WeatherModule } from '@routecast/weather';
import { GPX_PARSER, TogeojsonParser } from '@routecast/gpx';
import { ForecastController } from './forecast.controller';
import { ForecastFetchService } from './forecast-fetch.service';
import { ForecastSessionService } from './forecast-session.service';

@Module({
  imports: [WeatherModule.forRoot()],
  controllers: [ForecastController],
  providers: [
    ForecastFetchService,
    ForecastSessionService,
    {
      provide: GPX_PARSER,
      useClass: TogeojsonParser,
    },
  ],
  exports: [ForecastSessionService],
})
export class ForecastModule {}
