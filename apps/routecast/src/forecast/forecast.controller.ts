import { Body, Controller, Get, HttpCode, HttpStatus, NotFoundException, Param, Post, Query } from '@nestjs/common';
import { ForecastSessionService, type ForecastResult } from './forecast-session.service';
import { ForecastQueryDto } from './dto/forecast-query.dto';
import { SeriesParamsDto, SeriesQueryDto } from './dto/series.dto';

@Controller('forecast')
export class ForecastController {
  constructor(private readonly forecastSessionService: ForecastSessionService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async requestForecast(@Body() dto: ForecastQueryDto) {
    const result = await this.forecastSessionService.requestForecast(dto);
    return this.formatResponse(result);
  }

  @Get(':athleteId/:routeId')
  getLatest(@Param('athleteId') athleteId: string, @Param('routeId') routeId: string) {
    const result = this.forecastSessionService.getLatest(athleteId, routeId);
    if (!result) {
      throw new NotFoundException('No forecast for this route yet');
    }
    return this.formatResponse(result);
  }

  @Get(':athleteId/:routeId/series/:field')
  getSeries(@Param() params: SeriesParamsDto, @Query() query: SeriesQueryDto) {
    const series = this.forecastSessionService.getSeries(
      params.athleteId,
      params.routeId,
      params.field,
      query.labels !== 'false',
    );
    if (!series) {
      throw new NotFoundException('No forecast for this route yet');
    }
    return series;
  }

  private formatResponse(result: ForecastResult) {
    return {
      routeId: result.routeId,
      routeName: result.route?.name ?? null,
      issuedAt: result.issuedAt,
      departure: result.departure,
      stale: result.stale,
      locationForecasts: result.locationForecasts.map((forecast) => ({
        distanceKm: forecast.distanceKm,
        arrivalTime: forecast.arrivalTime,
        weatherIcon: forecast.weatherIcon,
        windIcon: forecast.windIcon,
        windSector: forecast.windSector,
        sample: forecast.sample,
      })),
      charts: result.charts,
    };
  }
}
