import { describe, it, expect, beforeEach } from '@jest/globals';
import { ServiceCatalog } from '../serviceCatalog';
import { HTTPStatusError, NotFoundError, ResponseFormatError } from '../errors';
import { StubTransport, createContext, serviceRecord, type StubReply } from './helpers/stubTransport';

const SERVICES_URL = 'http://jobs.test/api/services';

describe('ServiceCatalog', () => {
  let transport: StubTransport;
  let catalog: ServiceCatalog;

  beforeEach(() => {
    transport = new StubTransport().onGet(SERVICES_URL, {
      status: 200,
      data: { services: [serviceRecord('example'), serviceRecord('other')] },
    });
    catalog = new ServiceCatalog(createContext(transport));
  });

  it('fetches the catalog once for repeated reads', async () => {
    const first = await catalog.services();
    await catalog.services();
    await catalog.get('other');
    const last = await catalog.services();

    expect(transport.count('GET', SERVICES_URL)).toBe(1);
    expect(last).toBe(first);
    expect(first.map(service => service.id)).toEqual(['example', 'other']);
  });

  it('shares one fetch between concurrent first reads', async () => {
    const [a, b] = await Promise.all([catalog.services(), catalog.services()]);

    expect(transport.count('GET', SERVICES_URL)).toBe(1);
    expect(a).toBe(b);
  });

  it('builds services from their records', async () => {
    const service = await catalog.get('example');

    expect(service.url).toBe('http://jobs.test/api/services/example');
    expect(service.name).toBe('Service example');
    expect(service.classifiers.has('Topic :: Testing')).toBe(true);
    expect(service.status.status).toBe('OK');
    expect(service.presets[0]).toEqual({
      id: 'quick',
      name: 'Quick',
      description: 'Fast defaults',
      values: { param0: 1 },
    });
    expect(service.parameters.map(parameter => parameter.type)).toEqual([
      'integer',
      'text',
      'file',
      'flag',
      'choice',
      'text',
    ]);
    expect(service.getParameter('choice0')).toMatchObject({ choices: ['fast', 'slow'], required: false });
    expect(service.toString()).toBe('example: Service example');
  });

  it('keeps parameters of unfamiliar types with their raw attributes', async () => {
    transport.onGet(SERVICES_URL, {
      status: 200,
      data: {
        services: [
          serviceRecord('colours', {
            parameters: [{ type: 'colour', id: 'shade', name: 'Shade', palette: 'warm' }],
          }),
        ],
      },
    });

    const [parameter] = (await catalog.get('colours')).parameters;

    expect(parameter).toMatchObject({ type: 'unknown', rawType: 'colour', required: true, array: false });
    expect(parameter.type === 'unknown' && parameter.attributes.palette).toBe('warm');
  });

  it('raises NotFoundError for an unknown service id', async () => {
    await expect(catalog.get('missing')).rejects.toThrow(NotFoundError);
    await expect(catalog.get('missing')).rejects.toThrow('No service with id "missing"');
  });

  it('replaces the whole catalog on reload', async () => {
    const before = await catalog.services();
    transport.onGet(SERVICES_URL, { status: 200, data: { services: [serviceRecord('fresh')] } });

    const after = await catalog.reload();

    expect(transport.count('GET', SERVICES_URL)).toBe(2);
    expect(after.map(service => service.id)).toEqual(['fresh']);
    expect(await catalog.services()).toBe(after);
    expect(before.map(service => service.id)).toEqual(['example', 'other']);
    await expect(catalog.get('example')).rejects.toThrow(NotFoundError);
  });

  it('keeps the previous catalog when a reload fails', async () => {
    const before = await catalog.services();
    transport.onGet(SERVICES_URL, { status: 500, data: 'Internal Server Error' });

    await expect(catalog.reload()).rejects.toThrow(HTTPStatusError);

    expect(await catalog.services()).toBe(before);
    expect(transport.count('GET', SERVICES_URL)).toBe(2);
  });

  it('keeps the previous catalog when the new one is malformed', async () => {
    const before = await catalog.services();
    transport.onGet(SERVICES_URL, { status: 200, data: { services: [{ id: 'broken' }] } });

    await expect(catalog.reload()).rejects.toThrow(ResponseFormatError);

    expect(await catalog.services()).toBe(before);
  });

  it('does not let a slow reload overwrite a newer one', async () => {
    let releaseSlow: (reply: StubReply) => void = () => undefined;
    transport.onGet(SERVICES_URL, () => new Promise<StubReply>(resolve => (releaseSlow = resolve)));
    const slow = catalog.reload();

    transport.onGet(SERVICES_URL, { status: 200, data: { services: [serviceRecord('newer')] } });
    await catalog.reload();

    releaseSlow({ status: 200, data: { services: [serviceRecord('older')] } });
    await slow;

    expect((await catalog.services()).map(service => service.id)).toEqual(['newer']);
  });
});
