import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_RETRY_OPTIONS, RetryOptions } from '@routecast/common';
import { WEATHER_PROVIDER } from './weather-provider.interface';
import { YrProvider } from './providers';

@Module({})
export class WeatherModule {
  static forRoot(): DynamicModule {
    return {
      module: WeatherModule,
      providers: [
        {
          provide: WEATHER_PROVIDER,
          useFactory: (configService: ConfigService) =>
            new YrProvider({
              apiUrl: configService.getOrThrow<string>('weather.yrApiUrl'),
              userAgent: configService.getOrThrow<string>('weather.userAgent'),
              retry: configService.get<RetryOptions>('http.retry', DEFAULT_RETRY_OPTIONS),
            }),
          inject: [ConfigService],
        },
      ],
      exports: [WEATHER_PROVIDER],
    };
  }
}
