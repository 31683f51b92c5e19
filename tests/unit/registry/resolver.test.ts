import { beforeEach, describe, expect, it } from 'vitest';
import { CapabilityRegistry, CapabilityResolver, endpointUrl } from '../../../src/registry/index.js';
import { FakeNetwork } from '../../helpers/fake-network.js';
import { agentCard, CARS, FLIGHTS, HOTELS, registerStandardSpecialists } from '../../helpers/specialists.js';

describe('CapabilityResolver', () => {
  let network: FakeNetwork;

  beforeEach(() => {
    network = new FakeNetwork().install();
  });

  function createResolver(addresses: string[]): { registry: CapabilityRegistry; resolver: CapabilityResolver } {
    const registry = new CapabilityRegistry({ knownAddresses: addresses, timeoutMs: 1000 });
    return { registry, resolver: new CapabilityResolver(registry) };
  }

  it('triggers discovery on first use and resolves to the serving endpoint', async () => {
    registerStandardSpecialists(network);
    const { registry, resolver } = createResolver([FLIGHTS, HOTELS, CARS]);

    const endpoint = await resolver.resolve('searchHotels');

    expect(registry.getState()).toBe('ready');
    expect(endpoint).toEqual({ serviceId: 'hotel-svc', baseAddress: HOTELS, invocationPath: '/searchHotels' });
    expect(endpoint && endpointUrl(endpoint)).toBe('http://hotels.test/searchHotels');
  });

  it('returns null for a capability nobody offers', async () => {
    registerStandardSpecialists(network);
    const { resolver } = createResolver([FLIGHTS, HOTELS, CARS]);

    await expect(resolver.resolve('bookTrain')).resolves.toBeNull();
  });

  it('returns null when the registry is empty', async () => {
    const { resolver } = createResolver([FLIGHTS]);

    await expect(resolver.resolve('searchFlights')).resolves.toBeNull();
  });

  it('prefers the first registered service when several offer the capability', async () => {
    network
      .on('GET', 'http://a.test/agent-card', { json: agentCard('svc-a', 'http://a.test', { searchCars: '/a' }) })
      .on('GET', 'http://b.test/agent-card', { json: agentCard('svc-b', 'http://b.test', { searchCars: '/b' }) });
    const { resolver } = createResolver(['http://a.test', 'http://b.test']);

    const endpoint = await resolver.resolve('searchCars');

    expect(endpoint?.serviceId).toBe('svc-a');
  });

  it('skips an entry that lists the capability without a path', async () => {
    network
      .on('GET', 'http://a.test/agent-card', { json: agentCard('svc-a', 'http://a.test', { searchCars: undefined }) })
      .on('GET', 'http://b.test/agent-card', { json: agentCard('svc-b', 'http://b.test', { searchCars: '/cars' }) });
    const { resolver } = createResolver(['http://a.test', 'http://b.test']);

    const endpoint = await resolver.resolve('searchCars');

    expect(endpoint).toEqual({ serviceId: 'svc-b', baseAddress: 'http://b.test', invocationPath: '/cars' });
  });

  it('returns null when the only match has no path', async () => {
    network.on('GET', 'http://a.test/agent-card', { json: agentCard('svc-a', 'http://a.test', { searchCars: undefined }) });
    const { resolver } = createResolver(['http://a.test']);

    await expect(resolver.resolve('searchCars')).resolves.toBeNull();
  });

  it('resolves the other operations of a card that has a null path', async () => {
    network.on('GET', `${FLIGHTS}/agent-card`, {
      json: {
        serviceId: 'flight-svc',
        displayName: null,
        baseAddress: FLIGHTS,
        capabilities: [
          { capabilityId: 'searchFlights', path: '/searchFlights' },
          { capabilityId: 'bookFlight', path: null },
        ],
      },
    });
    const { resolver } = createResolver([FLIGHTS]);

    expect(await resolver.resolve('searchFlights')).toEqual({
      serviceId: 'flight-svc',
      baseAddress: FLIGHTS,
      invocationPath: '/searchFlights',
    });
    expect(await resolver.resolve('bookFlight')).toBeNull();
  });

  it('does not rediscover between lookups', async () => {
    registerStandardSpecialists(network);
    const { resolver } = createResolver([FLIGHTS, HOTELS, CARS]);

    await resolver.resolve('searchFlights');
    await resolver.resolve('bookFlight');
    await resolver.resolve('missingCapability');

    expect(network.calls.filter((call) => call.url.endsWith('/agent-card'))).toHaveLength(3);
  });
});
