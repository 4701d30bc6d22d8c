/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Connector Operations.
 */

import { ConnectorSchema, type Connector, type ConnectorParameters } from './models/connector';
import { pageResultsSchema, type PageResults } from './models/page';
import type { ApiService } from './service';

const URL_CONNECTORS = '/connectors';
const ConnectorPageSchema = pageResultsSchema(ConnectorSchema);

export class ConnectorOperations {
  constructor(private readonly service: ApiService) {}

  async list(params?: ConnectorParameters): Promise<PageResults<Connector>> {
    return this.service.get(URL_CONNECTORS, ConnectorPageSchema, {
      query: {
        name: params?.name,
        countries: params?.countries,
        types: params?.types,
        sandbox: params?.sandbox,
      },
    });
  }

  async get(id: number): Promise<Connector> {
    return this.service.get(`${URL_CONNECTORS}/{id}`, ConnectorSchema, { segment: id });
  }
}
