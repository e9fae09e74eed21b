export * from './CurrencyConnector';
export * from './InMemoryCurrencyConnector';
export * from './GovernanceConnector';
