import { ethers } from 'ethers';

import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';

import { AllowListAuthorizationGate } from './services/feeds/authorization';
import { FeedRegistryService } from './services/feeds/feedRegistryService';
import { PaymentJournal } from './services/paymentJournal';
import {
  CalculatedFeedContract,
  FastUpdaterFeedSource,
  FeeCalculatorContract,
  RelayRootPublisher
} from './services/chain/contractAdapters';

async function main(): Promise<void> {
  const provider = new ethers.JsonRpcProvider(config.chain.rpc, config.chain.chainId);
  const { registry: registryConfig } = config;

  const registry = new FeedRegistryService({
    indexedSource: new FastUpdaterFeedSource(
      registryConfig.fastUpdaterAddress,
      registryConfig.fastUpdatesConfigurationAddress,
      provider
    ),
    feeSchedule: new FeeCalculatorContract(registryConfig.feeCalculatorAddress, provider),
    rootPublisher: new RelayRootPublisher(registryConfig.relayAddress, provider),
    authorizationGate: new AllowListAuthorizationGate(registryConfig.governanceAddresses),
    protocolId: registryConfig.ftsoProtocolId,
    paymentJournal: new PaymentJournal(registryConfig.paymentJournalSize)
  });

  const calculatedFeedFactory = (address: string) => new CalculatedFeedContract(address, provider);

  if (registryConfig.calculatedFeedAddresses.length > 0) {
    await registry.addCalculatedFeeds(
      registryConfig.governanceAddresses[0],
      registryConfig.calculatedFeedAddresses.map(calculatedFeedFactory)
    );
    logger.info('Configured calculated feeds registered', {
      count: registryConfig.calculatedFeedAddresses.length
    });
  }

  registry.events.onAny(event => logger.info(`Registry event ${event.name}`, event.data));

  const app = createApp({ registry, calculatedFeedFactory });
  const port = config.server.port;

  app.listen(port, () => {
    logger.info(`Feed registry running on port ${port}`);
    logger.info(`API Documentation: http://localhost:${port}/api-docs`);
    logger.info(`Health Check: http://localhost:${port}/health`);
    logger.info(`Chain RPC: ${config.chain.rpc}`);
  });
}

main().catch(error => {
  logger.error('Feed registry failed to start', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
