import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { forecastConfig, httpConfig, stravaConfig, validate } from '@routecast/config';
import { weatherConfig } from '@routecast/weather';
import { StravaModule } from '@routecast/strava';
import { AppController } from './app.controller';
import { RoutesModule } from './routes/routes.module';
import { ForecastModule } from './forecast/forecast.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [stravaConfig, weatherConfig, httpConfig, forecastConfig],
      validate,
    }),
    StravaModule.forRoot(),
    RoutesModule,
    ForecastModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
