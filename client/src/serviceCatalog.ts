import { logger } from '@genkit-ai/core/logging';
import type { ApiContext } from './api';
import { NotFoundError } from './errors';
import { ServiceListSchema } from './schema';
import { Service } from './service';

interface CatalogSnapshot {
  services: readonly Service[];
  byId: ReadonlyMap<string, Service>;
  generation: number;
}

/**
 * Service catalog loaded once and replaced as a whole on reload.
 */
export class ServiceCatalog {
  private snapshot: CatalogSnapshot | undefined;
  private pending: Promise<CatalogSnapshot> | undefined;
  private requested = 0;

  constructor(private readonly context: ApiContext) {}

  /**
   * Services in server order. Only the first call goes to the server.
   */
  async services(): Promise<readonly Service[]> {
    if (this.snapshot) {
      return this.snapshot.services;
    }
    return (await (this.pending ?? this.track(this.load()))).services;
  }

  /**
   * Fetch the catalog again and replace the cached one.
   * On failure the previous catalog stays in place.
   */
  async reload(): Promise<readonly Service[]> {
    return (await this.track(this.load())).services;
  }

  /**
   * @throws NotFoundError if the catalog has no service with this id
   */
  async get(id: string): Promise<Service> {
    await this.services();
    const service = this.snapshot?.byId.get(id);
    if (!service) {
      throw new NotFoundError('service', id);
    }
    return service;
  }

  private track(load: Promise<CatalogSnapshot>): Promise<CatalogSnapshot> {
    const tracked: Promise<CatalogSnapshot> = load.finally(() => {
      if (this.pending === tracked) {
        this.pending = undefined;
      }
    });
    this.pending = tracked;
    return tracked;
  }

  private async load(): Promise<CatalogSnapshot> {
    const generation = ++this.requested;
    const url = this.context.resolve('api/services');
    const listing = await this.context.getJson(url, ServiceListSchema);
    const services = Object.freeze(listing.services.map(record => new Service(this.context, record)));
    const loaded: CatalogSnapshot = {
      services,
      byId: new Map(services.map(service => [service.id, service])),
      generation,
    };

    // an older load finishing late must not replace a newer catalog
    const current = this.snapshot;
    if (current && current.generation > generation) {
      return current;
    }
    this.snapshot = loaded;
    logger.info(`Loaded ${services.length} services from ${url}`);
    return loaded;
  }
}
