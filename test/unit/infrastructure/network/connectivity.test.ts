import { describe, it, expect } from '@jest/globals';
import { createServer } from 'node:net';
import { CLOUD_REGIONS } from '@/config/regions';
import { checkConnectivity, tcpProbe, type ProbeFn } from '@/infra/network/connectivity';
import { probeRefusing, silentLogger } from '../../../__support__/utilities/fakes';

const region = CLOUD_REGIONS['eu-1'];
const [sinkDomain, consoleDomain, apiDomain] = region.requiredDomains;

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('checkConnectivity', () => {
  it('should report no failures when every domain answers', async () => {
    const report = await checkConnectivity(region, { logger: silentLogger(), probe: probeRefusing() });

    expect(report.region).toBe('eu-1');
    expect(report.results.map((result) => result.domain)).toEqual(region.requiredDomains);
    expect(report.failures).toEqual([]);
  });

  it('should return exactly the unreachable domains in region order', async () => {
    const probe: ProbeFn = async (domain) => {
      // the first domain finishes last
      if (domain === sinkDomain) await delay(20);
      return domain === consoleDomain
        ? { domain, reachable: true, detail: 'OK' }
        : { domain, reachable: false, detail: 'connect ECONNREFUSED' };
    };

    const report = await checkConnectivity(region, { logger: silentLogger(), probe });

    expect(report.failures.map((failure) => failure.domain)).toEqual([sinkDomain, apiDomain]);
  });

  it('should count a throwing probe as unreachable', async () => {
    const probe: ProbeFn = async (domain) => {
      if (domain === apiDomain) throw new Error('getaddrinfo ENOTFOUND');
      return { domain, reachable: true, detail: 'OK' };
    };

    const report = await checkConnectivity(region, { logger: silentLogger(), probe });

    expect(report.failures).toEqual([{ domain: apiDomain, reachable: false, detail: 'getaddrinfo ENOTFOUND' }]);
  });

  it('should fail probes still pending at the deadline', async () => {
    const probe: ProbeFn = (domain) =>
      domain === consoleDomain
        ? new Promise(() => undefined)
        : Promise.resolve({ domain, reachable: true, detail: 'OK' });

    const report = await checkConnectivity(region, {
      logger: silentLogger(),
      probe,
      overallTimeoutMs: 50,
    });

    expect(report.failures).toEqual([
      { domain: consoleDomain, reachable: false, detail: 'no answer within 50ms' },
    ]);
  });

  it('should pass the port and per-probe timeout to the probe', async () => {
    const seen: string[] = [];
    const probe: ProbeFn = async (domain, port, timeoutMs) => {
      seen.push(`${domain}:${port}/${timeoutMs}`);
      return { domain, reachable: true, detail: 'OK' };
    };

    await checkConnectivity(region, { logger: silentLogger(), probe, probeTimeoutMs: 250, concurrency: 1 });

    expect(seen).toEqual(region.requiredDomains.map((domain) => `${domain}:443/250`));
  });

  it('should keep at most `concurrency` domain checks in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const probe: ProbeFn = async (domain) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
      return { domain, reachable: true, detail: 'OK' };
    };

    const report = await checkConnectivity(region, { logger: silentLogger(), probe, concurrency: 2 });

    expect(peak).toBe(2);
    expect(report.failures).toEqual([]);
  });

  it('should not start queued domain checks once the deadline passes', async () => {
    const started: string[] = [];
    const probe: ProbeFn = (domain) => {
      started.push(domain);
      return new Promise(() => undefined);
    };

    const report = await checkConnectivity(region, {
      logger: silentLogger(),
      probe,
      concurrency: 1,
      overallTimeoutMs: 30,
    });

    expect(started).toEqual([sinkDomain]);
    expect(report.failures.map((failure) => failure.domain)).toEqual(region.requiredDomains);
  });
});

describe('tcpProbe', () => {
  it('should connect to a listening port', async () => {
    const server = createServer((socket) => socket.end());
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no TCP address');
    }
    const { port } = address;

    try {
      expect(await tcpProbe('127.0.0.1', port, 1000)).toEqual({
        domain: '127.0.0.1',
        reachable: true,
        detail: 'OK',
      });
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});
