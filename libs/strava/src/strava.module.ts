import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_RETRY_OPTIONS, RetryOptions } from '@routecast/common';
import { STRAVA_CLIENT } from './strava-client.interface';
import { StravaHttpClient } from './strava-http.client';

@Module({})
export class StravaModule {
  static forRoot(): DynamicModule {
    return {
      module: StravaModule,
      global: true,
      providers: [
        {
          provide: STRAVA_CLIENT,
          useFactory: (configService: ConfigService) =>
            new StravaHttpClient({
              apiUrl: configService.getOrThrow<string>('strava.apiUrl'),
              tokenUrl: configService.getOrThrow<string>('strava.tokenUrl'),
              clientId: configService.get<string>('strava.clientId', ''),
              clientSecret: configService.get<string>('strava.clientSecret', ''),
              refreshToken: configService.get<string>('strava.refreshToken', ''),
              retry: configService.get<RetryOptions>('http.retry', DEFAULT_RETRY_OPTIONS),
            }),
          inject: [ConfigService],
        },
      ],
      exports: [STRAVA_CLIENT],
    };
  }
}
