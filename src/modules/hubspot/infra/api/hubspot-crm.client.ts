import { Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';

import {
  parseSearchResults,
  type HubSpotObject,
} from '@/modules/hubspot/application/mappers/hubspot.mapper';

export type HubSpotObjectType = 'contacts' | 'deals';

export interface HubSpotFilter {
  propertyName: string;
  operator: 'EQ' | 'CONTAINS_TOKEN';
  value: string;
}

export interface HubSpotSearchParams {
  filters: HubSpotFilter[];
  properties: string[];
  limit: number;
}

@Injectable()
export class HubSpotCrmClient {
  constructor(private readonly http: HttpService) {}

  /**
   * `POST /crm/v3/objects/{type}/search` com um único filterGroup (AND entre
   * os filtros). Erros de rede, timeout, status != 2xx e corpo inválido são
   * propagados; quem decide o fallback é o adapter.
   */
  async search(objectType: HubSpotObjectType, params: HubSpotSearchParams): Promise<HubSpotObject[]> {
    const { data } = await firstValueFrom(
      this.http.post<unknown>(`/crm/v3/objects/${objectType}/search`, {
        filterGroups: [{ filters: params.filters }],
        properties: params.properties,
        limit: params.limit,
      }),
    );

    return parseSearchResults(data);
  }
}
