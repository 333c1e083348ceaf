import { once } from 'events';
import { expect } from 'chai';
import { PriceUpdatedEvent } from '../app/src/app/oracle-service';
import { WsReadChannel, WsReadServer } from '../app/src/peers/ws-read-channel';
import { OracleMode } from '../app/src/types';
import { FakeClock, silentLogger } from './helpers/fakes';
import { T0, fixture } from './helpers/service-fixture';

const PRODUCER_REF = '0x00000000000000000000000000000000000000a1';

describe('WebSocket read transport', () => {
  let server: WsReadServer;
  let channel: WsReadChannel | null = null;

  afterEach(async () => {
    channel?.close();
    channel = null;
    await server.stop();
  });

  it('carries a read to a peer and its answer back', async () => {
    const clock = new FakeClock(T0);
    const producer = fixture({}, clock).service;
    producer.setMode(OracleMode.Producer);
    await producer.updatePrice();

    server = new WsReadServer(0, producer, silentLogger);
    await server.start();
    const port = server.boundPort();
    expect(port).to.be.a('number');

    const consumer = fixture({ chainId: 2 }, clock).service;
    consumer.setMode(OracleMode.Consumer);
    channel = new WsReadChannel(5, new Map([[1, `ws://127.0.0.1:${String(port)}`]]), silentLogger);
    consumer.setReadChannel(channel);
    consumer.registerPeer(1, PRODUCER_REF);

    const adopted = once(consumer, 'price_updated');
    await consumer.requestRemotePrice(1);
    const [event]: PriceUpdatedEvent[] = await adopted;

    expect(event?.assetPrice18).to.equal(1_500_000_000_000_000_000n);
    expect(consumer.latestPrice()).to.deep.equal({ price: 1_500_000_000_000_000_000n, timestamp: T0 });
    expect(consumer.getPendingRequests()).to.deep.equal([]);
  });

  it('shares one connection between concurrent reads of the same chain', async () => {
    const clock = new FakeClock(T0);
    const producer = fixture({}, clock).service;
    producer.setMode(OracleMode.Producer);
    await producer.updatePrice();

    server = new WsReadServer(0, producer, silentLogger);
    await server.start();

    const consumer = fixture({ chainId: 2 }, clock).service;
    consumer.setMode(OracleMode.Consumer);
    channel = new WsReadChannel(5, new Map([[1, `ws://127.0.0.1:${String(server.boundPort())}`]]), silentLogger);
    consumer.setReadChannel(channel);
    consumer.registerPeer(1, PRODUCER_REF);

    let answers = 0;
    const bothAnswered = new Promise<void>((resolve) => {
      consumer.on('peer_price_received', () => {
        answers++;
        if (answers === 2) resolve();
      });
    });
    await Promise.all([consumer.requestRemotePrice(1), consumer.requestRemotePrice(1)]);
    await bothAnswered;

    expect(server.connectionCount()).to.equal(1);
    expect(consumer.getPendingRequests()).to.deep.equal([]);
  });

  it('refuses to quote chains without a read server', async () => {
    server = new WsReadServer(0, fixture().service, silentLogger);
    channel = new WsReadChannel(5, new Map(), silentLogger);
    const consumer = fixture({ chainId: 2 }).service;
    consumer.setReadChannel(channel);
    consumer.registerPeer(1, PRODUCER_REF);

    try {
      await consumer.quoteFee(1);
      expect.fail('quoteFee should have thrown');
    } catch (error) {
      expect(error instanceof Error ? error.message : '').to.equal(
        'Fee quote for chain 1 failed: No read server known for chain 1'
      );
    }
  });
});
