// Jest setup file for feed registry tests

// Environment read by src/config before any test module loads it
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.ORACLE_CHAIN_RPC = 'http://localhost:8545';
process.env.GOVERNANCE_ADDRESSES = '0x' + '1'.repeat(40);
process.env.FAST_UPDATER_ADDRESS = '0x' + '2'.repeat(40);
process.env.FAST_UPDATES_CONFIGURATION_ADDRESS = '0x' + '3'.repeat(40);
process.env.FEE_CALCULATOR_ADDRESS = '0x' + '4'.repeat(40);
process.env.RELAY_ADDRESS = '0x' + '5'.repeat(40);
process.env.PAYMENT_JOURNAL_SIZE = '10';

jest.setTimeout(10000);
