/**
 * Tunnel Service Tests
 */

import { TunnelService, createTunnelService } from '../tunnel.service';
import { NoCandidatesError } from '../../../lib/errors';
import { DialRoute, OutboundRequest } from '../../../lib/transport/transport.types';
import {
  FakeRouterBinding,
  connectionRefused,
  createClock,
  createMockTransport,
  createResponse,
} from '../../../__tests__/helpers/mocks';
import { directoryHtml, emptyDirectoryHtml } from '../../../__tests__/helpers/fixtures';

const DIRECTORY_URL = 'http://outproxys.i2p/';
const INGRESS = 'http://127.0.0.1:4444';

function isDirectoryFetch(request: OutboundRequest, route: DialRoute): boolean {
  return request.url === DIRECTORY_URL && route.proxyUrl === INGRESS;
}

describe('TunnelService', () => {
  let service: TunnelService | undefined;
  let binding: FakeRouterBinding;
  let clock: ReturnType<typeof createClock>;

  beforeEach(() => {
    binding = new FakeRouterBinding();
    clock = createClock();
  });

  afterEach(async () => {
    await service?.shutdown();
    service = undefined;
  });

  function createService(handler: Parameters<typeof createMockTransport>[0]) {
    const transport = createMockTransport(handler);
    service = createTunnelService({
      transport,
      binding,
      directoryUrl: DIRECTORY_URL,
      retestIntervalMs: 300000,
      clock: clock.now,
    });
    return { service, transport };
  }

  it('should discover, rank and route a clearnet request through the first candidate', async () => {
    const { service, transport } = createService((request, route) =>
      isDirectoryFetch(request, route) ? createResponse(200, directoryHtml) : createResponse(200, 'clearnet page')
    );

    const response = await service.get('http://example.com/');

    expect(response.status).toBe(200);
    expect(response.body.toString()).toBe('clearnet page');
    expect(response.proxyUsed).toBe('https://proxya.i2p:443');
    expect(binding.start).toHaveBeenCalledTimes(1);
    expect(transport.send).toHaveBeenCalledTimes(2);
  });

  it('should reuse the known proxies within the retest interval', async () => {
    const { service, transport } = createService((request, route) =>
      isDirectoryFetch(request, route) ? createResponse(200, directoryHtml) : createResponse(200, 'ok')
    );

    await service.get('http://example.com/a');
    await service.get('http://example.com/b');

    const directoryFetches = transport.send.mock.calls.filter(([request, route]) => isDirectoryFetch(request, route));
    expect(directoryFetches).toHaveLength(1);
  });

  it('should share one directory fetch between concurrent requests', async () => {
    const { service, transport } = createService((request, route) =>
      isDirectoryFetch(request, route) ? createResponse(200, directoryHtml) : createResponse(200, 'ok')
    );

    const responses = await Promise.all([
      service.get('http://example.com/a'),
      service.get('http://example.com/b'),
      service.fetchProxies(),
    ]);

    const directoryFetches = transport.send.mock.calls.filter(([request, route]) => isDirectoryFetch(request, route));
    expect(directoryFetches).toHaveLength(1);
    expect(responses[0].status).toBe(200);
    expect(responses[1].status).toBe(200);
    expect(responses[2]).toHaveLength(2);
  });

  it('should rediscover once the retest interval has passed', async () => {
    const { service, transport } = createService((request, route) =>
      isDirectoryFetch(request, route) ? createResponse(200, directoryHtml) : createResponse(200, 'ok')
    );

    await service.get('http://example.com/a');
    clock.advance(300000);
    await service.get('http://example.com/b');

    const directoryFetches = transport.send.mock.calls.filter(([request, route]) => isDirectoryFetch(request, route));
    expect(directoryFetches).toHaveLength(2);
  });

  it('should keep the previous proxies when rediscovery fails', async () => {
    let directoryUp = true;
    const { service } = createService((request, route) => {
      if (isDirectoryFetch(request, route)) {
        if (!directoryUp) throw connectionRefused('127.0.0.1:4444');
        return createResponse(200, directoryHtml);
      }
      return createResponse(200, 'ok');
    });

    await service.fetchProxies();
    directoryUp = false;
    clock.advance(300000);
    const response = await service.get('http://example.com/');

    expect(response.status).toBe(200);
    expect(service.getStatus().knownProxies).toHaveLength(2);
  });

  it('should send overlay requests through the ingress without discovery', async () => {
    const { service, transport } = createService(() => createResponse(200, 'eepsite'));

    const response = await service.get('http://forum.i2p/');

    expect(response.proxyUsed).toBe(INGRESS);
    expect(transport.send).toHaveBeenCalledTimes(1);
    expect(transport.send.mock.calls[0][0].url).toBe('http://forum.i2p/');
  });

  it('should fail with NoCandidatesError when the directory lists nothing', async () => {
    const { service } = createService(() => createResponse(200, emptyDirectoryHtml));

    await expect(service.get('http://example.com/')).rejects.toBeInstanceOf(NoCandidatesError);
  });

  it('should post a body through the router', async () => {
    const { service, transport } = createService((request, route) =>
      isDirectoryFetch(request, route) ? createResponse(200, directoryHtml) : createResponse(201, 'created')
    );

    const response = await service.post('http://example.com/items', '{"name":"test"}', {
      headers: { 'Content-Type': 'application/json' },
    });

    expect(response.status).toBe(201);
    const sent = transport.send.mock.calls[1][0];
    expect(sent).toMatchObject({ method: 'POST', body: '{"name":"test"}' });
  });

  it('should report placeholder results when benchmarking overlay-hosted proxies', async () => {
    const { service } = createService((request, route) =>
      isDirectoryFetch(request, route) ? createResponse(200, directoryHtml) : createResponse(200)
    );

    const results = await service.benchmarkProxies();

    expect(results).toHaveLength(2);
    expect(results.every((r) => r.success && r.throughput === 51200 && r.latencyMs === 200)).toBe(true);
  });

  it('should download through the ranked candidates', async () => {
    const { service } = createService((request, route) => {
      if (isDirectoryFetch(request, route)) return createResponse(200, directoryHtml);
      if (request.method === 'HEAD') return createResponse(200, '', { 'content-length': '4' });
      return createResponse(200, 'data');
    });

    const result = await service.download('http://files.example/small.txt');

    expect(result.data.toString()).toBe('data');
    expect(result.parallel).toBe(false);
  });

  it('should stop and clean up the overlay router on shutdown', async () => {
    const { service } = createService(() => createResponse(200, 'eepsite'));
    await service.get('http://forum.i2p/');

    await service.shutdown();

    expect(binding.stop).toHaveBeenCalledTimes(1);
    expect(binding.cleanup).toHaveBeenCalledTimes(1);
    expect(service.getStatus().overlay.running).toBe(false);
  });
});
