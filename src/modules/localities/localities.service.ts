import { Injectable } from '@nestjs/common';
import { IpmaClientService } from '../ipma/ipma-client.service';
import { LocalitiesListResponse } from './localities.dto';

export interface LocalityFilter {
  search?: string;
  districtId?: number;
}

@Injectable()
export class LocalitiesService {
  constructor(private readonly ipmaClient: IpmaClientService) {}

  /**
   * List localities, optionally filtered by name substring and district.
   * This is how callers discover the globalIdLocal the forecast routes take.
   */
  async findAll(filter: LocalityFilter = {}): Promise<LocalitiesListResponse> {
    let items = await this.ipmaClient.getLocalities();

    if (filter.search) {
      const search = filter.search.toLowerCase();
      items = items.filter((item) =>
        (item.local ?? '').toLowerCase().includes(search),
      );
    }
    if (filter.districtId !== undefined) {
      const districtId = filter.districtId;
      items = items.filter(
        (item) => Number(item.idDistrito ?? -1) === districtId,
      );
    }

    return { count: items.length, data: items };
  }
}
