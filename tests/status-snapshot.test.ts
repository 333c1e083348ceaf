import { Server } from 'http';
import { expect } from 'chai';
import {
  createStatusApp,
  peersSnapshot,
  priceSnapshot,
  statusSnapshot,
  toJsonSnapshot,
} from '../app/src/app/status-server';
import { OracleMode } from '../app/src/types';
import { e18 } from './helpers/fakes';
import { T0, fixture } from './helpers/service-fixture';

describe('status snapshots', () => {
  it('stringifies bigints and drops undefined fields', () => {
    expect(toJsonSnapshot({ a: 1n, b: undefined, c: [2n, undefined], d: { e: null } })).to.deep.equal({
      a: '1',
      c: ['2', null],
      d: { e: null },
    });
  });

  it('describes the served price', async () => {
    const { service } = fixture();
    service.setMode(OracleMode.Producer);
    await service.updatePrice();

    expect(priceSnapshot(service)).to.deep.equal({
      chainId: 1,
      price: '1500000000000000000',
      timestamp: T0,
      display: '1.5',
      nativePrice: '3000000000000000000000',
      nativeTimestamp: T0,
      fresh: true,
    });
  });

  it('describes the oracle state', () => {
    const { service } = fixture();
    service.setMode(OracleMode.Consumer);

    expect(statusSnapshot(service)).to.deep.equal({
      chainId: 1,
      mode: 'Consumer',
      emergencyMode: false,
      circuitBreakerActive: false,
      inGracePeriod: true,
      activeSources: 2,
      maxDeviationBps: 0,
      priceInitialized: false,
      sources: [
        {
          kind: 'pull-quote',
          endpointRef: '0xpull',
          weight: 50,
          maxStalenessSeconds: 3600,
          active: true,
          extra: '',
        },
        {
          kind: 'proxy-read',
          endpointRef: '0xproxy',
          weight: 50,
          maxStalenessSeconds: 3600,
          active: true,
          extra: '',
        },
      ],
      twap: { cumulativePriceLast: '0', lastTimestamp: 0, ratio18: '0', initialized: false },
      pendingRequests: 0,
      stats: { updateCount: 0, errorCount: 0 },
    });
  });

  it('lists peers with their validity', () => {
    const { service } = fixture();
    service.registerPeer(10, '0x00000000000000000000000000000000000000b1');
    service.onRemoteResponse(10, e18(7), T0);

    expect(peersSnapshot(service)).to.deep.equal({
      activePeerIds: [10],
      peers: [
        {
          chainId: 10,
          remoteOracleRef: '0x00000000000000000000000000000000000000b1',
          active: true,
          lastPrice18: '7000000000000000000',
          lastTimestamp: T0,
          valid: true,
        },
      ],
    });
  });

  describe('HTTP routes', () => {
    let server: Server;
    let baseUrl: string;

    before(async () => {
      const { service } = fixture();
      service.setMode(OracleMode.Producer);
      await service.updatePrice();

      server = createStatusApp(service).listen(0, '127.0.0.1');
      await new Promise<void>((resolve) => server.once('listening', () => resolve()));
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('status app is not listening on a TCP port');
      }
      baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    });

    it('reports health', async () => {
      const res = await fetch(`${baseUrl}/health`);
      expect(await res.json()).to.deep.equal({ status: 'ok', chainId: 1, mode: 'Producer' });
    });

    it('serves the price', async () => {
      const res = await fetch(`${baseUrl}/api/price`);
      expect(await res.json()).to.deep.include({ price: '1500000000000000000', display: '1.5' });
    });

    it('serves the validation report', async () => {
      const res = await fetch(`${baseUrl}/api/validate`);
      expect(await res.json()).to.deep.equal({ localValid: true, crossChainValid: false });
    });
  });
});
