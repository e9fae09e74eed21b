export * from './AuditService';
export * from './UnitLedger';
export * from './AssetRegistry';
export * from './OfferBook';
export * from './LedgerState';
export * from './TradingEngine';
export * from './PortfolioService';
