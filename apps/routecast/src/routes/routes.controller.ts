import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import type { Route } from '@routecast/models';
import { roundTo } from '@routecast/common';
import { RoutesService } from './routes.service';

@Controller('athletes/:athleteId/routes')
export class RoutesController {
  constructor(private readonly routesService: RoutesService) {}

  @Get()
  async findByAthlete(@Param('athleteId') athleteId: string) {
    const routes = await this.routesService.findByAthlete(athleteId);
    return routes.map((route) => this.formatRoute(route));
  }

  @Get(':routeId')
  async findById(@Param('athleteId') athleteId: string, @Param('routeId') routeId: string) {
    const route = await this.routesService.findById(routeId);
    if (!route || route.athleteId !== athleteId) {
      throw new NotFoundException('Route not found');
    }
    return this.formatRoute(route);
  }

  private formatRoute(route: Route) {
    return {
      id: route.id,
      athleteId: route.athleteId,
      name: route.name,
      distanceKm: roundTo(route.distance / 1000, 1),
    };
  }
}
