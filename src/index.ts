/**
 * Proportional Asset Ledger - Main Entry Point
 * Fractional ownership of registered assets: offers, transfers, purchases and ownership claims
 */

import { ApplicationConfig, ConfigurationManager } from './config/ConfigurationManager';
import { ICurrencyConnector } from './connectors/CurrencyConnector';
import { IStakeholderRegistry, ITrustVerifier } from './connectors/GovernanceConnector';
import { AuditService } from './services/AuditService';
import { LedgerState } from './services/LedgerState';
import { PortfolioService } from './services/PortfolioService';
import { TradingEngine } from './services/TradingEngine';
import { createLogger, Logger } from './utils/logger';

export * from './models';
export * from './services';
export * from './connectors';
export * from './security';
export * from './config';
export * from './utils';

export const APP_VERSION = '1.0.0';
export const APP_NAME = 'Proportional Asset Ledger';

export interface LedgerOptions {
  currency: ICurrencyConnector;
  /** Defaults to the built-in defaults */
  config?: ApplicationConfig;
  /** Used only when `config` is absent */
  configuration?: ConfigurationManager;
  logger?: Logger;
  trustVerifier?: ITrustVerifier;
  stakeholderRegistry?: IStakeholderRegistry;
}

export interface Ledger {
  config: ApplicationConfig;
  state: LedgerState;
  engine: TradingEngine;
  portfolio: PortfolioService;
  audit?: AuditService;
  logger: Logger;
}

/**
 * Wires configuration, logging, audit trail, state and engine together
 */
export function createLedger(options: LedgerOptions): Ledger {
  const configuration = options.configuration ?? new ConfigurationManager(undefined, {});
  const config = options.config ?? configuration.getConfiguration();

  const validation = configuration.validateConfiguration(config);
  if (!validation.isValid) {
    throw new Error(`Invalid ledger configuration: ${validation.errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
  }

  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const audit = config.audit.enabled
    ? new AuditService({
        signingKey: config.audit.signingKey ? Buffer.from(config.audit.signingKey, 'hex') : undefined,
        maxEvents: config.audit.maxEvents
      })
    : undefined;

  const state = new LedgerState({
    maxTotalUnits: config.engine.maxTotalUnits,
    rejectDuplicateMetadata: config.engine.rejectDuplicateMetadata
  });

  const engine = new TradingEngine(state, options.currency, {
    verifyConservation: config.engine.verifyConservation,
    auditService: audit,
    logger,
    trustVerifier: options.trustVerifier,
    stakeholderRegistry: options.stakeholderRegistry
  });

  logger.debug({ environment: config.environment, version: config.version }, 'ledger initialized');

  return { config, state, engine, portfolio: new PortfolioService(state), audit, logger };
}
