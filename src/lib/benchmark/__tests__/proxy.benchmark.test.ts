/**
 * Proxy Benchmark Tests
 */

import { ProxyBenchmark, summarizeResults } from '../proxy.benchmark';
import {
  SocksClientError,
  connectionRefused,
  createMockTransport,
  createResponse,
  failedResult,
  record,
  successResult,
} from '../../../__tests__/helpers/mocks';

const TEST_URL = 'http://bench.example/bytes/10240';
const payload = Buffer.alloc(10240, 1);

/**
 * Clock that moves forward by `step` ms on every read
 */
function steppingClock(step: number) {
  let now = 0;
  return () => {
    now += step;
    return now;
  };
}

describe('ProxyBenchmark', () => {
  describe('probe', () => {
    it('should report overlay-hosted proxies as successful without dialing', async () => {
      const transport = createMockTransport(() => {
        throw new Error('should not dial');
      });
      const benchmark = new ProxyBenchmark(transport, {
        overlayThroughput: 51200,
        overlayLatencyMs: 200,
      });

      const result = await benchmark.probe(record('exit.b32.i2p', 443));

      expect(result).toEqual({
        record: record('exit.b32.i2p', 443),
        success: true,
        throughput: 51200,
        latencyMs: 200,
      });
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('should measure latency with HEAD and throughput with GET', async () => {
      const transport = createMockTransport((request) =>
        request.method === 'HEAD' ? createResponse(200) : createResponse(200, payload)
      );
      // Reads: HEAD start 100, HEAD end 200, GET start 300, GET end 400
      const benchmark = new ProxyBenchmark(transport, {
        testUrl: TEST_URL,
        timeoutMs: 10000,
        now: steppingClock(100),
      });

      const result = await benchmark.probe(record('10.0.0.1', 8080, 'http'));

      expect(result.success).toBe(true);
      expect(result.latencyMs).toBe(100);
      expect(result.throughput).toBe(102400);
      expect(transport.send).toHaveBeenNthCalledWith(
        1,
        { url: TEST_URL, method: 'HEAD', timeoutMs: 10000 },
        { scheme: 'http', proxyUrl: 'http://10.0.0.1:8080' }
      );
      expect(transport.send).toHaveBeenNthCalledWith(
        2,
        { url: TEST_URL, method: 'GET', timeoutMs: 10000 },
        { scheme: 'http', proxyUrl: 'http://10.0.0.1:8080' }
      );
    });

    it('should treat a zero elapsed download as a failure', async () => {
      const transport = createMockTransport(() => createResponse(200, payload));
      const benchmark = new ProxyBenchmark(transport, { testUrl: TEST_URL, now: () => 5 });

      const result = await benchmark.probe(record('10.0.0.1', 8080, 'http'));

      expect(result).toMatchObject({ success: false, throughput: 0, error: 'Download time was zero' });
    });

    it('should fail on a non-2xx reference response', async () => {
      const transport = createMockTransport(() => createResponse(403, 'denied'));
      const benchmark = new ProxyBenchmark(transport, { testUrl: TEST_URL, now: steppingClock(10) });

      const result = await benchmark.probe(record('10.0.0.1', 443));

      expect(result).toMatchObject({ success: false, error: 'HTTP error: 403' });
    });

    it('should fold transport errors into a failed result', async () => {
      const transport = createMockTransport(() => {
        throw connectionRefused('10.0.0.1:8080');
      });
      const benchmark = new ProxyBenchmark(transport, { testUrl: TEST_URL, now: steppingClock(10) });

      const result = await benchmark.probe(record('10.0.0.1', 8080, 'http'));

      expect(result).toEqual({
        record: record('10.0.0.1', 8080, 'http'),
        success: false,
        throughput: 0,
        latencyMs: 0,
        error: 'Request failed: connect ECONNREFUSED 10.0.0.1:8080',
      });
    });

    it('should fall back to an HTTPS tunnel when SOCKS setup fails', async () => {
      const transport = createMockTransport((request, route) => {
        if (route.scheme === 'socks5') {
          throw new SocksClientError('Socks5 proxy rejected connection');
        }
        return request.method === 'HEAD' ? createResponse(200) : createResponse(200, payload);
      });
      const benchmark = new ProxyBenchmark(transport, { testUrl: TEST_URL, now: steppingClock(50) });

      const result = await benchmark.probe(record('10.0.0.2', 1080));

      expect(result.success).toBe(true);
      expect(transport.send.mock.calls.map(([, route]) => route.proxyUrl)).toEqual([
        'socks5://10.0.0.2:1080',
        'https://10.0.0.2:1080',
        'socks5://10.0.0.2:1080',
        'https://10.0.0.2:1080',
      ]);
    });
  });

  describe('probeMany', () => {
    it('should return three successes for three overlay records at concurrency 2', async () => {
      const transport = createMockTransport(() => createResponse(200, payload));
      const benchmark = new ProxyBenchmark(transport);
      const records = [record('one.i2p', 443), record('two.b32.i2p', 1080), record('three.i2p', 8443)];

      const results = await benchmark.probeMany(records, 2);

      expect(results).toHaveLength(3);
      expect(results.every((r) => r.success)).toBe(true);
      expect(results.map((r) => r.record.host).sort()).toEqual(['one.i2p', 'three.i2p', 'two.b32.i2p']);
    });

    it('should return an empty list for no records', async () => {
      const transport = createMockTransport(() => createResponse(200, payload));
      const benchmark = new ProxyBenchmark(transport);

      await expect(benchmark.probeMany([])).resolves.toEqual([]);
    });

    it('should return one result per record when some probes fail', async () => {
      const transport = createMockTransport((_request, route) => {
        if (route.proxyUrl.includes('10.0.0.9')) throw connectionRefused('10.0.0.9:8080');
        return createResponse(200, payload);
      });
      const benchmark = new ProxyBenchmark(transport, { testUrl: TEST_URL, now: steppingClock(10) });

      const results = await benchmark.probeMany([
        record('10.0.0.1', 8080, 'http'),
        record('10.0.0.9', 8080, 'http'),
        record('gate.i2p', 443),
      ]);

      expect(results).toHaveLength(3);
      expect(results.filter((r) => r.success)).toHaveLength(2);
      expect(results.find((r) => !r.success)?.record.host).toBe('10.0.0.9');
    });
  });
});

describe('summarizeResults', () => {
  it('should count outcomes and name the fastest success', () => {
    const a = record('10.0.0.1', 8080, 'http');
    const b = record('10.0.0.2', 443);
    const c = record('10.0.0.3', 1080);

    const summary = summarizeResults([successResult(a, 1000), successResult(b, 5000), failedResult(c)]);

    expect(summary).toEqual({
      total: 3,
      successful: 2,
      failed: 1,
      fastest: { url: 'https://10.0.0.2:443', throughput: 5000 },
    });
  });

  it('should leave fastest undefined when nothing succeeded', () => {
    const summary = summarizeResults([failedResult(record('10.0.0.1', 8080))]);

    expect(summary.fastest).toBeUndefined();
  });
});
