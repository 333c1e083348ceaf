#!/usr/bin/env node
/**
 * Cross-chain price oracle - Main Entry Point
 *
 * Aggregates native/USD from on-chain and Hermes feeds, derives the asset
 * price from pool reserves, and exchanges prices with peer oracles over
 * WebSocket remote reads.
 */

import { JsonRpcProvider } from 'ethers';
import { parseCliArgs, validateCliOptions, displayUsage, DEFAULT_CONFIG_PATH } from './utils/cli-parser';
import { initLogger } from './utils/logger';
import { loadOracleConfig, OracleConfig } from './config/oracle-config';
import { OracleService } from './app/oracle-service';
import { StatusServer } from './app/status-server';
import { EvmFeedConnector } from './sources/evm/evm-feeds';
import { HermesPriceFeed } from './sources/hermes-client';
import { EvmPoolConnector } from './liquidity/evm/uniswap-v2-pair';
import { WsReadChannel, WsReadServer } from './peers/ws-read-channel';
import { RegistryContract } from './peers/oracle-registry';
import { parseOracleMode } from './controller/oracle-mode';
import { SourceAlert } from './quality/source-health';
import { LogLevel } from './types';
import { formatPrice18 } from './utils/fixed-point';

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const argv = process.argv;
  if (argv.includes('--help') || argv.includes('-h')) {
    displayUsage();
    return;
  }

  const validationError = validateCliOptions(argv);
  if (validationError) {
    console.error(validationError);
    displayUsage();
    process.exit(1);
  }
  const options = parseCliArgs(argv);

  let config: OracleConfig;
  try {
    config = await loadOracleConfig(options.configPath ?? DEFAULT_CONFIG_PATH);
  } catch (error) {
    console.error(`\n❌ ERROR: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const logger = initLogger({
    logFile: options.logFile,
    verbose: options.verbose,
    level: options.verbose ? LogLevel.DEBUG : config.logLevel,
  });

  const provider = new JsonRpcProvider(config.rpcUrl);
  const hermes = config.hermes.enabled ? new HermesPriceFeed(config.hermes.url) : null;

  const service = new OracleService({
    chainId: config.chainId,
    feedConnector: new EvmFeedConnector(provider, hermes ?? undefined),
    poolConnector: new EvmPoolConnector(provider),
    logger,
    quoteSymbol: config.quoteSymbol,
    minValidSources: config.minValidSources,
    pools: config.pools,
    twapEnabled: config.twap.enabled,
    twapPeriodSeconds: config.twap.periodSeconds,
    maxDeviationBps: config.deviationGate.maxDeviationBps,
    gracePeriodSeconds: config.deviationGate.gracePeriodSeconds,
    minPeerAgreement: config.peers.minPeerAgreement,
    maxPeerDivergenceBps: config.peers.maxPeerDivergenceBps,
    requestTtlSeconds: config.peers.requestTtlSeconds,
    readConfirmations: config.peers.confirmations,
    updateIntervalMs: config.updateIntervalMs,
  });

  service.on('source_alert', (alert: SourceAlert) => {
    logger.warn(`[${alert.severity}] ${alert.type}: ${alert.message}`);
  });

  for (const source of config.sources) {
    service.setFeedSource(source.kind, source);
  }
  service.setMode(parseOracleMode(options.mode ?? config.mode));

  const peerUrls = new Map<number, string>();
  for (const endpoint of config.peers.endpoints) {
    if (endpoint.readUrl) {
      peerUrls.set(endpoint.chainId, endpoint.readUrl);
    }
  }
  const readChannel = new WsReadChannel(config.peers.readChannelId, peerUrls, logger);
  service.setReadChannel(readChannel);

  for (const endpoint of config.peers.endpoints) {
    service.registerPeer(endpoint.chainId, endpoint.oracleRef);
  }
  if (config.peers.registry) {
    const registered = await service.configureFromRegistry(
      new RegistryContract(config.peers.registry, provider),
      config.peers.endpoints.map((e) => e.chainId)
    );
    logger.info(`Registry confirmed ${registered} peer(s)`);
  }

  await service.initialize();

  const cleanup = (): void => {
    readChannel.close();
    hermes?.close();
    provider.destroy();
  };

  if (options.isDryRun) {
    try {
      const latest = await service.updatePrice();
      logger.info(
        `Dry run: asset ${formatPrice18(latest.assetPrice18)} USD, ` +
          `native ${formatPrice18(latest.nativePrice18)} USD at ${latest.timestamp}`
      );
    } finally {
      cleanup();
      logger.close();
    }
    return;
  }

  const statusServer = new StatusServer(service, config.server.statusPort, logger);
  const readServer = new WsReadServer(config.server.readPort, service, logger);

  // Setup graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down…');
    service.stop();
    cleanup();
    try {
      await Promise.all([statusServer.stop(), readServer.stop()]);
    } catch (error) {
      logger.error('Error during shutdown:', error);
    }
    logger.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  try {
    await statusServer.start();
    await readServer.start();
    service.start();
  } catch (error) {
    logger.error('Fatal error:', error);
    cleanup();
    logger.close();
    process.exit(1);
  }
}

// Run main
main().catch((error) => {
  console.error('Fatal:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
