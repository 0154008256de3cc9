import { Controller, Get, Query } from '@nestjs/common';
import { LocalitiesService } from './localities.service';
import { LocalitiesListResponse, LocalitiesQueryDto } from './localities.dto';

@Controller('v1/localities')
export class LocalitiesController {
  constructor(private readonly localitiesService: LocalitiesService) {}

  @Get()
  async findAll(
    @Query() query: LocalitiesQueryDto,
  ): Promise<LocalitiesListResponse> {
    return this.localitiesService.findAll({
      search: query.q,
      districtId: query.district_id,
    });
  }
}
