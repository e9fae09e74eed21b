/**
 * Tests for Configuration Manager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationManager } from './ConfigurationManager';

const SIGNING_KEY = '00112233445566778899aabbccddeeff';

describe('ConfigurationManager', () => {
  let configManager: ConfigurationManager;

  beforeEach(() => {
    configManager = new ConfigurationManager(undefined, {});
  });

  describe('Configuration Loading and Validation', () => {
    it('should load default configuration successfully', async () => {
      const config = await configManager.loadConfiguration();

      expect(config).toEqual(ConfigurationManager.getDefaultConfiguration());
      expect(config.engine.maxTotalUnits).toBe(Number.MAX_SAFE_INTEGER);
      expect(config.audit).toEqual({ enabled: true, maxEvents: 0 });
    });

    it('should validate configuration correctly', () => {
      const validation = configManager.validateConfiguration(configManager.getConfiguration());

      expect(validation.isValid).toBe(true);
      expect(validation.errors).toHaveLength(0);
    });

    it('should reject invalid unit limits', () => {
      fc.assert(
        fc.property(fc.oneof(fc.integer({ max: 0 }), fc.double({ min: 0.1, max: 0.9 })), maxTotalUnits => {
          const config = configManager.getConfiguration();
          config.engine.maxTotalUnits = maxTotalUnits;

          const validation = configManager.validateConfiguration(config);

          expect(validation.isValid).toBe(false);
          expect(validation.errors.map(e => e.path)).toEqual(['engine.maxTotalUnits']);
        }),
        { numRuns: 50 }
      );
    });

    it('should reject malformed signing keys and negative event limits', () => {
      const config = configManager.getConfiguration();
      config.audit.signingKey = 'not-hex';
      config.audit.maxEvents = -1;

      const validation = configManager.validateConfiguration(config);

      expect(validation.errors.map(e => e.path)).toEqual(['audit.signingKey', 'audit.maxEvents']);
    });
  });

  describe('Environment Overrides', () => {
    it('should apply environment variables over defaults', async () => {
      const manager = new ConfigurationManager(undefined, {
        NODE_ENV: 'production',
        LOG_LEVEL: 'warn',
        LEDGER_MAX_TOTAL_UNITS: '1000000',
        LEDGER_REJECT_DUPLICATE_METADATA: 'false',
        LEDGER_VERIFY_CONSERVATION: '0',
        AUDIT_ENABLED: 'true',
        AUDIT_SIGNING_KEY: SIGNING_KEY,
        AUDIT_MAX_EVENTS: '500'
      });

      const config = await manager.loadConfiguration();

      expect(config).toEqual({
        environment: 'production',
        version: '1.0.0',
        logLevel: 'warn',
        engine: { maxTotalUnits: 1_000_000, rejectDuplicateMetadata: false, verifyConservation: false },
        audit: { enabled: true, signingKey: SIGNING_KEY, maxEvents: 500 }
      });
    });

    it('should reject unparseable booleans and log levels', async () => {
      await expect(
        new ConfigurationManager(undefined, { AUDIT_ENABLED: 'maybe' }).loadConfiguration()
      ).rejects.toThrow('Failed to load configuration: AUDIT_ENABLED must be true or false');
      await expect(
        new ConfigurationManager(undefined, { LOG_LEVEL: 'verbose' }).loadConfiguration()
      ).rejects.toThrow('Failed to load configuration: LOG_LEVEL must be one of debug, info, warn, error, silent');
    });

    it('should reject environment values that fail validation', async () => {
      await expect(
        new ConfigurationManager(undefined, { LEDGER_MAX_TOTAL_UNITS: 'lots' }).loadConfiguration()
      ).rejects.toThrow(
        'Failed to load configuration: Configuration validation failed: engine.maxTotalUnits: Max total units must be a positive safe integer'
      );
    });
  });

  describe('Configuration File', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'ledger-config-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('should merge file settings under environment overrides', async () => {
      const filePath = join(directory, 'ledger.json');
      await writeFile(
        filePath,
        JSON.stringify({
          environment: 'staging',
          version: '2.3.0',
          logLevel: 'debug',
          engine: { maxTotalUnits: 5000, verifyConservation: false },
          audit: { enabled: false, maxEvents: 10 }
        })
      );

      const config = await new ConfigurationManager(filePath, { LOG_LEVEL: 'error' }).loadConfiguration();

      expect(config).toEqual({
        environment: 'staging',
        version: '2.3.0',
        logLevel: 'error',
        engine: { maxTotalUnits: 5000, rejectDuplicateMetadata: true, verifyConservation: false },
        audit: { enabled: false, maxEvents: 10 }
      });
    });

    it('should reject a file that is not a JSON object', async () => {
      const filePath = join(directory, 'ledger.json');
      await writeFile(filePath, '[1, 2, 3]');

      await expect(new ConfigurationManager(filePath, {}).loadConfiguration()).rejects.toThrow(
        `Failed to load configuration: Configuration file ${filePath} must contain a JSON object`
      );
    });
  });

  describe('Configuration Sections', () => {
    it('should return copies of configuration sections', () => {
      const engine = configManager.getConfigSection('engine');
      engine.maxTotalUnits = 1;

      expect(configManager.getConfigSection('engine').maxTotalUnits).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('should update configuration when the result is valid', () => {
      configManager.updateConfiguration({ engine: { maxTotalUnits: 100 }, audit: { signingKey: SIGNING_KEY } });

      expect(configManager.getConfigSection('engine').maxTotalUnits).toBe(100);
      expect(configManager.getConfigSection('audit').signingKey).toBe(SIGNING_KEY);
    });

    it('should not apply an invalid update', () => {
      expect(() => configManager.updateConfiguration({ audit: { maxEvents: -3 } })).toThrow(
        'Configuration update failed validation: Max audit events must be a non-negative integer'
      );
      expect(configManager.getConfigSection('audit').maxEvents).toBe(0);
    });
  });
});
