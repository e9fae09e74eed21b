/**
 * Configuration Manager for ledger settings and environment-specific configuration
 */

import { readFile } from 'fs/promises';

export type Environment = 'development' | 'staging' | 'production';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface EngineConfig {
  maxTotalUnits: number;
  rejectDuplicateMetadata: boolean;
  verifyConservation: boolean;
}

export interface AuditConfig {
  enabled: boolean;
  /** Hex-encoded HMAC key; a random key is generated per process when absent */
  signingKey?: string;
  /** 0 keeps every event */
  maxEvents: number;
}

export interface ApplicationConfig {
  environment: Environment;
  version: string;
  logLevel: LogLevel;
  engine: EngineConfig;
  audit: AuditConfig;
}

export interface ConfigOverrides {
  environment?: Environment;
  version?: string;
  logLevel?: LogLevel;
  engine?: Partial<EngineConfig>;
  audit?: Partial<AuditConfig>;
}

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export interface EnvironmentVariables {
  NODE_ENV?: string;
  LOG_LEVEL?: string;
  LEDGER_MAX_TOTAL_UNITS?: string;
  LEDGER_REJECT_DUPLICATE_METADATA?: string;
  LEDGER_VERIFY_CONSERVATION?: string;
  AUDIT_ENABLED?: string;
  AUDIT_SIGNING_KEY?: string;
  AUDIT_MAX_EVENTS?: string;
  [key: string]: string | undefined;
}

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export class ConfigurationManager {
  private config: ApplicationConfig;
  private readonly configFilePath?: string;
  private readonly env: EnvironmentVariables;

  constructor(configFilePath?: string, env: EnvironmentVariables = process.env) {
    this.configFilePath = configFilePath;
    this.env = env;

    // Initialize with default configuration
    this.config = ConfigurationManager.getDefaultConfiguration();
  }

  /**
   * Loads configuration from file and environment variables
   */
  async loadConfiguration(): Promise<ApplicationConfig> {
    try {
      const fileConfig = this.configFilePath ? await this.loadConfigurationFromFile(this.configFilePath) : {};
      const envConfig = this.loadConfigurationFromEnvironment();

      // Environment takes precedence over the file
      const merged = this.mergeConfigurations(
        this.mergeConfigurations(ConfigurationManager.getDefaultConfiguration(), fileConfig),
        envConfig
      );

      const validation = this.validateConfiguration(merged);
      if (!validation.isValid) {
        throw new Error(`Configuration validation failed: ${validation.errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
      }

      this.config = merged;
      return this.getConfiguration();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to load configuration: ${errorMessage}`);
    }
  }

  getConfiguration(): ApplicationConfig {
    return {
      ...this.config,
      engine: { ...this.config.engine },
      audit: { ...this.config.audit }
    };
  }

  getConfigSection<T extends 'engine' | 'audit'>(section: T): ApplicationConfig[T] {
    return this.getConfiguration()[section];
  }

  /**
   * Applies overrides to the current configuration; an update that fails validation is not applied
   */
  updateConfiguration(overrides: ConfigOverrides): void {
    const candidate = this.mergeConfigurations(this.config, overrides);

    const validation = this.validateConfiguration(candidate);
    if (!validation.isValid) {
      throw new Error(`Configuration update failed validation: ${validation.errors.map(e => e.message).join(', ')}`);
    }

    this.config = candidate;
  }

  validateConfiguration(config: ApplicationConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];

    if (!ENVIRONMENTS.includes(config.environment)) {
      errors.push({
        path: 'environment',
        message: 'Environment must be development, staging, or production',
        value: config.environment
      });
    }

    if (!LOG_LEVELS.includes(config.logLevel)) {
      errors.push({
        path: 'logLevel',
        message: `Log level must be one of ${LOG_LEVELS.join(', ')}`,
        value: config.logLevel
      });
    }

    errors.push(...this.validateEngineConfig(config.engine));
    errors.push(...this.validateAuditConfig(config.audit));

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  private validateEngineConfig(config: EngineConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!Number.isSafeInteger(config.maxTotalUnits) || config.maxTotalUnits < 1) {
      errors.push({
        path: 'engine.maxTotalUnits',
        message: 'Max total units must be a positive safe integer',
        value: config.maxTotalUnits
      });
    }

    if (typeof config.rejectDuplicateMetadata !== 'boolean') {
      errors.push({
        path: 'engine.rejectDuplicateMetadata',
        message: 'Duplicate metadata rejection must be a boolean',
        value: config.rejectDuplicateMetadata
      });
    }

    if (typeof config.verifyConservation !== 'boolean') {
      errors.push({
        path: 'engine.verifyConservation',
        message: 'Conservation verification must be a boolean',
        value: config.verifyConservation
      });
    }

    return errors;
  }

  private validateAuditConfig(config: AuditConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (typeof config.enabled !== 'boolean') {
      errors.push({
        path: 'audit.enabled',
        message: 'Audit enabled flag must be a boolean',
        value: config.enabled
      });
    }

    if (config.signingKey !== undefined && !/^([0-9a-fA-F]{2}){16,}$/.test(config.signingKey)) {
      errors.push({
        path: 'audit.signingKey',
        message: 'Audit signing key must be hex encoded and at least 16 bytes'
      });
    }

    if (!Number.isSafeInteger(config.maxEvents) || config.maxEvents < 0) {
      errors.push({
        path: 'audit.maxEvents',
        message: 'Max audit events must be a non-negative integer',
        value: config.maxEvents
      });
    }

    return errors;
  }

  private loadConfigurationFromEnvironment(): ConfigOverrides {
    const env = this.env;
    const envConfig: ConfigOverrides = {};

    if (env.NODE_ENV && isOneOf(env.NODE_ENV, ENVIRONMENTS)) {
      envConfig.environment = env.NODE_ENV;
    }

    if (env.LOG_LEVEL) {
      if (!isOneOf(env.LOG_LEVEL, LOG_LEVELS)) {
        throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
      }
      envConfig.logLevel = env.LOG_LEVEL;
    }

    const engine: Partial<EngineConfig> = {
      ...(env.LEDGER_MAX_TOTAL_UNITS && { maxTotalUnits: Number(env.LEDGER_MAX_TOTAL_UNITS) }),
      ...(env.LEDGER_REJECT_DUPLICATE_METADATA && {
        rejectDuplicateMetadata: parseBoolean('LEDGER_REJECT_DUPLICATE_METADATA', env.LEDGER_REJECT_DUPLICATE_METADATA)
      }),
      ...(env.LEDGER_VERIFY_CONSERVATION && {
        verifyConservation: parseBoolean('LEDGER_VERIFY_CONSERVATION', env.LEDGER_VERIFY_CONSERVATION)
      })
    };
    if (Object.keys(engine).length > 0) {
      envConfig.engine = engine;
    }

    const audit: Partial<AuditConfig> = {
      ...(env.AUDIT_ENABLED && { enabled: parseBoolean('AUDIT_ENABLED', env.AUDIT_ENABLED) }),
      ...(env.AUDIT_SIGNING_KEY && { signingKey: env.AUDIT_SIGNING_KEY }),
      ...(env.AUDIT_MAX_EVENTS && { maxEvents: Number(env.AUDIT_MAX_EVENTS) })
    };
    if (Object.keys(audit).length > 0) {
      envConfig.audit = audit;
    }

    return envConfig;
  }

  private async loadConfigurationFromFile(filePath: string): Promise<ConfigOverrides> {
    const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    if (!isRecord(raw)) {
      throw new Error(`Configuration file ${filePath} must contain a JSON object`);
    }

    const overrides: ConfigOverrides = {};

    if (typeof raw.environment === 'string' && isOneOf(raw.environment, ENVIRONMENTS)) {
      overrides.environment = raw.environment;
    }
    if (typeof raw.version === 'string') {
      overrides.version = raw.version;
    }
    if (typeof raw.logLevel === 'string' && isOneOf(raw.logLevel, LOG_LEVELS)) {
      overrides.logLevel = raw.logLevel;
    }

    if (isRecord(raw.engine)) {
      const engine: Partial<EngineConfig> = {};
      if (typeof raw.engine.maxTotalUnits === 'number') engine.maxTotalUnits = raw.engine.maxTotalUnits;
      if (typeof raw.engine.rejectDuplicateMetadata === 'boolean') engine.rejectDuplicateMetadata = raw.engine.rejectDuplicateMetadata;
      if (typeof raw.engine.verifyConservation === 'boolean') engine.verifyConservation = raw.engine.verifyConservation;
      overrides.engine = engine;
    }

    if (isRecord(raw.audit)) {
      const audit: Partial<AuditConfig> = {};
      if (typeof raw.audit.enabled === 'boolean') audit.enabled = raw.audit.enabled;
      if (typeof raw.audit.signingKey === 'string') audit.signingKey = raw.audit.signingKey;
      if (typeof raw.audit.maxEvents === 'number') audit.maxEvents = raw.audit.maxEvents;
      overrides.audit = audit;
    }

    return overrides;
  }

  private mergeConfigurations(base: ApplicationConfig, override: ConfigOverrides): ApplicationConfig {
    return {
      ...base,
      ...(override.environment && { environment: override.environment }),
      ...(override.version && { version: override.version }),
      ...(override.logLevel && { logLevel: override.logLevel }),
      engine: { ...base.engine, ...override.engine },
      audit: { ...base.audit, ...override.audit }
    };
  }

  static getDefaultConfiguration(): ApplicationConfig {
    return {
      environment: 'development',
      version: '1.0.0',
      logLevel: 'info',
      engine: {
        maxTotalUnits: Number.MAX_SAFE_INTEGER,
        rejectDuplicateMetadata: true,
        verifyConservation: true
      },
      audit: {
        enabled: true,
        maxEvents: 0
      }
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
  return allowed.some(candidate => candidate === value);
}

function parseBoolean(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new Error(`${name} must be true or false`);
  }
}
