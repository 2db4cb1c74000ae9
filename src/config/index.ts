import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

interface ServerConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  apiPrefix: string;
  corsOrigin: string;
}

interface ChainConfig {
  rpc: string;
  chainId: number;
}

interface RegistryConfig {
  ftsoProtocolId: number;
  governanceAddresses: string[];
  fastUpdaterAddress: string;
  fastUpdatesConfigurationAddress: string;
  feeCalculatorAddress: string;
  relayAddress: string;
  calculatedFeedAddresses: string[];
  paymentJournalSize: number;
}

interface AppConfig {
  server: ServerConfig;
  chain: ChainConfig;
  registry: RegistryConfig;
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export const config: AppConfig = {
  server: {
    port: parseInt(process.env.PORT || '3000'),
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',
    apiPrefix: process.env.API_PREFIX || '/api/v1',
    corsOrigin: process.env.CORS_ORIGIN || '*'
  },

  chain: {
    rpc: requireEnv('ORACLE_CHAIN_RPC'),
    chainId: parseInt(process.env.ORACLE_CHAIN_ID || '14')
  },

  registry: {
    ftsoProtocolId: parseInt(process.env.FTSO_PROTOCOL_ID || '100'),
    governanceAddresses: parseList(requireEnv('GOVERNANCE_ADDRESSES')),
    fastUpdaterAddress: requireEnv('FAST_UPDATER_ADDRESS'),
    fastUpdatesConfigurationAddress: requireEnv('FAST_UPDATES_CONFIGURATION_ADDRESS'),
    feeCalculatorAddress: requireEnv('FEE_CALCULATOR_ADDRESS'),
    relayAddress: requireEnv('RELAY_ADDRESS'),
    calculatedFeedAddresses: parseList(process.env.CALCULATED_FEED_ADDRESSES),
    paymentJournalSize: parseInt(process.env.PAYMENT_JOURNAL_SIZE || '100')
  }
};

export default config;
