import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ICurrencyConnector } from '../connectors/CurrencyConnector';
import { HoldingsChange } from '../connectors/GovernanceConnector';
import { InMemoryCurrencyConnector } from '../connectors/InMemoryCurrencyConnector';
import { createLogger } from '../utils/logger';
import { AuditService } from './AuditService';
import { LedgerState } from './LedgerState';
import { TradingEngine } from './TradingEngine';

const logger = createLogger({ level: 'silent' });

function expectLedgerError(fn: () => unknown, code: string): void {
  expect(fn).toThrow(expect.objectContaining({ name: 'LedgerError', code }));
}

describe('TradingEngine', () => {
  let state: LedgerState;
  let currency: InMemoryCurrencyConnector;
  let audit: AuditService;
  let engine: TradingEngine;

  beforeEach(() => {
    state = new LedgerState();
    currency = new InMemoryCurrencyConnector({ alice: 0, bob: 10_000, carol: 50 });
    audit = new AuditService({ signingKey: Buffer.from('test-secret') });
    engine = new TradingEngine(state, currency, { auditService: audit, logger });
  });

  describe('createProportionalAsset', () => {
    it('gives the creator every unit', () => {
      const assetId = engine.createProportionalAsset('alice', 'Corner shop, 12 High St', 1000);

      expect(assetId).toBe('asset_1');
      expect(engine.getAsset(assetId).status).toBe('active');
      expect(engine.getHolding(assetId, 'alice').units).toBe(1000);
      expect(engine.getMainOwner(assetId)).toBe('alice');
    });

    it('rejects a zero denomination and invalid creators', () => {
      expectLedgerError(() => engine.createProportionalAsset('alice', 'empty', 0), 'INVALID_DENOMINATION');
      expectLedgerError(() => engine.createProportionalAsset('', 'nameless', 10), 'INVALID_ACCOUNT');
      expectLedgerError(() => engine.createProportionalAsset('al ice', 'spaced', 10), 'INVALID_ACCOUNT');
      expect(engine.listAssets()).toEqual([]);
    });

    it('rejects metadata the creator has already registered', () => {
      engine.createProportionalAsset('alice', 'flat 2', 100);

      expectLedgerError(() => engine.createProportionalAsset('alice', 'flat 2', 100), 'ASSET_ALREADY_EXISTS');
      expect(engine.createProportionalAsset('bob', 'flat 2', 100)).toBe('asset_2');
      expect(engine.getHolding('asset_2', 'bob').units).toBe(100);
    });
  });

  describe('offerShares', () => {
    it('locks units and keeps them out of transfers', () => {
      const assetId = engine.createProportionalAsset('alice', 'boat', 1000);
      const offerId = engine.offerShares('alice', assetId, 400, 2);

      expect(offerId).toBe('offer_1');
      expect(engine.getHolding(assetId, 'alice')).toEqual({ assetId, account: 'alice', units: 1000, lockedUnits: 400 });
      expectLedgerError(() => engine.transferSharesToAccount('alice', 'carol', assetId, 601), 'INSUFFICIENT_UNITS');
      expectLedgerError(() => engine.offerShares('alice', assetId, 601, 2), 'INSUFFICIENT_UNITS');
    });

    it('validates units, price and asset', () => {
      const assetId = engine.createProportionalAsset('alice', 'boat', 1000);

      expectLedgerError(() => engine.offerShares('alice', assetId, 0, 2), 'INVALID_AMOUNT');
      expectLedgerError(() => engine.offerShares('alice', assetId, 10, -1), 'INVALID_AMOUNT');
      expectLedgerError(() => engine.offerShares('alice', 'asset_99', 10, 1), 'NOT_FOUND');
      expect(engine.listOffers(assetId)).toEqual([]);
    });

    it('accepts a zero price', () => {
      const assetId = engine.createProportionalAsset('alice', 'gift', 10);
      const offerId = engine.offerShares('alice', assetId, 10, 0);

      engine.buyShares('carol', offerId, 10);

      expect(engine.getHolding(assetId, 'carol').units).toBe(10);
      expect(currency.getPayments().map(p => p.amount)).toEqual([0]);
    });
  });

  describe('transferSharesToAccount', () => {
    it('moves unlocked units without payment', () => {
      const assetId = engine.createProportionalAsset('alice', 'field', 100);
      engine.transferSharesToAccount('alice', 'carol', assetId, 30);

      expect(engine.getHolding(assetId, 'alice').units).toBe(70);
      expect(engine.getHolding(assetId, 'carol').units).toBe(30);
      expect(currency.getPayments()).toEqual([]);
    });

    it('treats a transfer to oneself as a no-op', () => {
      const assetId = engine.createProportionalAsset('alice', 'field', 100);
      engine.transferSharesToAccount('alice', 'alice', assetId, 100);

      expect(engine.getHolding(assetId, 'alice').units).toBe(100);
      expectLedgerError(() => engine.transferSharesToAccount('alice', 'alice', assetId, 101), 'INSUFFICIENT_UNITS');
    });

    it('refuses transfers the sender cannot cover', () => {
      const assetId = engine.createProportionalAsset('alice', 'field', 100);

      expectLedgerError(() => engine.transferSharesToAccount('bob', 'carol', assetId, 1), 'INSUFFICIENT_UNITS');
      expectLedgerError(() => engine.transferSharesToAccount('alice', 'carol', assetId, 0), 'INVALID_AMOUNT');
    });
  });

  describe('buyShares', () => {
    it('fills an offer across two purchases', () => {
      const assetId = engine.createProportionalAsset('alice', 'bakery', 1000);
      const offerId = engine.offerShares('alice', assetId, 400, 2);

      engine.buyShares('bob', offerId, 300);

      expect(engine.getHolding(assetId, 'alice')).toEqual({ assetId, account: 'alice', units: 700, lockedUnits: 100 });
      expect(engine.getHolding(assetId, 'bob').units).toBe(300);
      expect(engine.getOffer(offerId).unitsRemaining).toBe(100);
      expect(currency.getBalance('bob')).toBe(9_400);
      expect(currency.getBalance('alice')).toBe(600);

      engine.buyShares('bob', offerId, 100);

      expect(engine.getOffer(offerId).status).toBe('filled');
      expect(engine.getHolding(assetId, 'alice')).toEqual({ assetId, account: 'alice', units: 600, lockedUnits: 0 });
      expect(engine.getHolding(assetId, 'bob').units).toBe(400);
      expect(currency.getBalance('alice')).toBe(800);
      expect(engine.verifyInvariants(assetId).violations).toEqual([]);
    });

    it('leaves units and offer untouched when payment is declined', () => {
      const assetId = engine.createProportionalAsset('alice', 'bakery', 1000);
      const offerId = engine.offerShares('alice', assetId, 400, 2);

      // carol holds 50, the purchase costs 200
      expectLedgerError(() => engine.buyShares('carol', offerId, 100), 'PAYMENT_FAILED');

      expect(engine.getHolding(assetId, 'alice')).toEqual({ assetId, account: 'alice', units: 1000, lockedUnits: 400 });
      expect(engine.getHolding(assetId, 'carol').units).toBe(0);
      expect(engine.getOffer(offerId)).toMatchObject({ unitsRemaining: 400, status: 'open' });
      expect(currency.getBalance('carol')).toBe(50);
    });

    it('rolls back when the currency connector throws', () => {
      const failing: ICurrencyConnector = {
        pay: () => {
          throw new Error('ledger unavailable');
        }
      };
      const local = new TradingEngine(state, failing, { logger });
      const assetId = local.createProportionalAsset('alice', 'bakery', 1000);
      const offerId = local.offerShares('alice', assetId, 400, 2);

      expect(() => local.buyShares('bob', offerId, 100)).toThrow(
        expect.objectContaining({
          code: 'PAYMENT_FAILED',
          message: 'Payment of 200 from bob to alice failed: ledger unavailable'
        })
      );
      expect(local.getHolding(assetId, 'bob').units).toBe(0);
      expect(local.getOffer(offerId).unitsRemaining).toBe(400);
    });

    it('rejects purchases beyond what remains or from closed offers', () => {
      const assetId = engine.createProportionalAsset('alice', 'bakery', 1000);
      const offerId = engine.offerShares('alice', assetId, 400, 2);

      expectLedgerError(() => engine.buyShares('bob', offerId, 401), 'EXCEEDS_REMAINING');
      expectLedgerError(() => engine.buyShares('bob', offerId, 0), 'INVALID_AMOUNT');
      expectLedgerError(() => engine.buyShares('bob', offerId, -3), 'INVALID_AMOUNT');
      expectLedgerError(() => engine.buyShares('bob', 'offer_9', 1), 'NOT_FOUND');

      engine.cancelOffer('alice', offerId);
      expectLedgerError(() => engine.buyShares('bob', offerId, 1), 'NOT_OPEN');
      expect(currency.getPayments()).toEqual([]);
    });

    it('rejects buying from oneself', () => {
      const assetId = engine.createProportionalAsset('alice', 'bakery', 1000);
      const offerId = engine.offerShares('alice', assetId, 400, 2);

      expectLedgerError(() => engine.buyShares('alice', offerId, 1), 'SELF_PURCHASE');
    });

    it('rejects prices beyond the safe integer range', () => {
      const assetId = engine.createProportionalAsset('alice', 'bakery', 1000);
      const offerId = engine.offerShares('alice', assetId, 400, Number.MAX_SAFE_INTEGER);

      expectLedgerError(() => engine.buyShares('bob', offerId, 2), 'INVALID_AMOUNT');
    });
  });

  describe('cancelOffer', () => {
    it('releases the remaining locked units', () => {
      const assetId = engine.createProportionalAsset('alice', 'kiln', 100);
      const offerId = engine.offerShares('alice', assetId, 60, 1);
      engine.buyShares('bob', offerId, 10);

      expectLedgerError(() => engine.cancelOffer('bob', offerId), 'NOT_SELLER');
      engine.cancelOffer('alice', offerId);

      expect(engine.getOffer(offerId).status).toBe('cancelled');
      expect(engine.getHolding(assetId, 'alice')).toEqual({ assetId, account: 'alice', units: 90, lockedUnits: 0 });
    });
  });

  describe('claimOwnership', () => {
    it('requires the whole asset', () => {
      const assetId = engine.createProportionalAsset('alice', 'cottage', 1000);
      engine.transferSharesToAccount('alice', 'bob', assetId, 1);

      expectLedgerError(() => engine.claimOwnership('alice', assetId), 'INSUFFICIENT_OWNERSHIP');
      expect(engine.getMainOwner(assetId)).toBe('alice');

      engine.transferSharesToAccount('bob', 'alice', assetId, 1);
      engine.claimOwnership('alice', assetId);

      expect(engine.getAsset(assetId)).toMatchObject({ status: 'claimed', owner: 'alice' });
      expect(engine.getMainOwner(assetId)).toBe('alice');
    });

    it('freezes trading once claimed', () => {
      const assetId = engine.createProportionalAsset('alice', 'cottage', 1000);
      engine.claimOwnership('alice', assetId);

      expectLedgerError(() => engine.claimOwnership('alice', assetId), 'ASSET_CLAIMED');
      expectLedgerError(() => engine.offerShares('alice', assetId, 1, 1), 'ASSET_CLAIMED');
      expectLedgerError(() => engine.transferSharesToAccount('alice', 'bob', assetId, 1), 'ASSET_CLAIMED');
      expect(engine.getHolding(assetId, 'alice').units).toBe(1000);
    });

    it("cancels the claimant's open offers", () => {
      const assetId = engine.createProportionalAsset('alice', 'cottage', 1000);
      const offerId = engine.offerShares('alice', assetId, 250, 4);

      engine.claimOwnership('alice', assetId);

      expect(engine.getOffer(offerId).status).toBe('cancelled');
      expect(engine.getHolding(assetId, 'alice').lockedUnits).toBe(0);
      expectLedgerError(() => engine.buyShares('bob', offerId, 1), 'ASSET_CLAIMED');
      expect(engine.verifyInvariants(assetId)).toEqual({
        assetId,
        totalUnits: 1000,
        heldUnits: 1000,
        conserved: true,
        locksConsistent: true,
        violations: []
      });
    });
  });

  describe('read views', () => {
    it('returns copies that cannot change the ledger', () => {
      const assetId = engine.createProportionalAsset('alice', 'shed', 100);
      const offerId = engine.offerShares('alice', assetId, 10, 1);
      engine.cancelOffer('alice', offerId);
      engine.claimOwnership('alice', assetId);

      const asset: { status: string } = engine.getAsset(assetId);
      asset.status = 'active';
      const listed: { status: string } = engine.listAssets()[0];
      listed.status = 'active';
      const holding: { units: number; lockedUnits: number } = engine.getHolding(assetId, 'alice');
      holding.units = 500;
      holding.lockedUnits = 7;
      const offer: { status: string; unitsRemaining: number } = engine.getOffer(offerId);
      offer.status = 'open';
      offer.unitsRemaining = 10;
      const offers: { status: string }[] = engine.listOffers(assetId);
      offers[0].status = 'open';

      expect(engine.getAsset(assetId).status).toBe('claimed');
      expectLedgerError(() => engine.transferSharesToAccount('alice', 'bob', assetId, 10), 'ASSET_CLAIMED');
      expect(engine.getHolding(assetId, 'alice')).toEqual({ assetId, account: 'alice', units: 100, lockedUnits: 0 });
      expect(engine.getOffer(offerId)).toMatchObject({ status: 'cancelled', unitsRemaining: 10 });
      expect(engine.verifyInvariants(assetId)).toMatchObject({ heldUnits: 100, conserved: true, violations: [] });
    });
  });

  describe('getMainOwner', () => {
    it('is undefined when nobody holds more than half', () => {
      const assetId = engine.createProportionalAsset('alice', 'studio', 10);
      engine.transferSharesToAccount('alice', 'bob', assetId, 5);

      expect(engine.getMainOwner(assetId)).toBeUndefined();

      engine.transferSharesToAccount('alice', 'bob', assetId, 1);
      expect(engine.getMainOwner(assetId)).toBe('bob');
    });
  });

  describe('audit trail', () => {
    it('records committed operations in order with valid signatures', () => {
      const assetId = engine.createProportionalAsset('alice', 'garage', 100);
      const offerId = engine.offerShares('alice', assetId, 100, 1);
      engine.buyShares('bob', offerId, 100);
      engine.claimOwnership('bob', assetId);

      const events = engine.getEvents();
      expect(events.map(e => e.eventType)).toEqual([
        'ASSET_CREATED',
        'SHARES_OFFERED',
        'SHARES_PURCHASED',
        'OFFER_FILLED',
        'OWNERSHIP_CLAIMED'
      ]);
      expect(events.map(e => e.sequence)).toEqual([1, 2, 3, 4, 5]);
      expect(events[2].details).toEqual({
        offerId,
        buyer: 'bob',
        seller: 'alice',
        units: 100,
        unitPrice: 1,
        totalPrice: 100,
        paymentTransactionId: 'payment_1'
      });
      expect(audit.verifyLogIntegrity()).toBe(true);
    });

    it('records rejections without any partial events', () => {
      const assetId = engine.createProportionalAsset('alice', 'garage', 100);
      expect(() => engine.transferSharesToAccount('bob', 'carol', assetId, 5)).toThrow();

      const events = engine.getEvents();
      expect(events.map(e => e.eventType)).toEqual(['ASSET_CREATED', 'OPERATION_REJECTED']);
      expect(events[1]).toMatchObject({
        accountId: 'bob',
        assetId,
        details: {
          operation: 'transferSharesToAccount',
          code: 'INSUFFICIENT_UNITS',
          message: 'Cannot transfer 5 units: bob has 0 unlocked'
        }
      });
    });
  });

  describe('governance hooks', () => {
    it('consults the trust verifier for sellers and buyers', () => {
      const trusted = new Set(['alice', 'bob']);
      const local = new TradingEngine(state, currency, { logger, trustVerifier: { isTrusted: account => trusted.has(account) } });
      const assetId = local.createProportionalAsset('alice', 'depot', 100);
      local.transferSharesToAccount('alice', 'carol', assetId, 10);

      expectLedgerError(() => local.offerShares('carol', assetId, 10, 1), 'UNTRUSTED_ACCOUNT');

      const offerId = local.offerShares('alice', assetId, 10, 1);
      expectLedgerError(() => local.buyShares('carol', offerId, 1), 'UNTRUSTED_ACCOUNT');
      local.buyShares('bob', offerId, 1);
      expect(local.getHolding(assetId, 'bob').units).toBe(1);
    });

    it('notifies the stakeholder registry after commit only', () => {
      const changes: HoldingsChange[] = [];
      const local = new TradingEngine(state, currency, {
        logger,
        stakeholderRegistry: { onHoldingsChanged: change => changes.push(change) }
      });
      const assetId = local.createProportionalAsset('alice', 'depot', 100);
      local.transferSharesToAccount('alice', 'bob', assetId, 40);
      expect(() => local.transferSharesToAccount('carol', 'bob', assetId, 1)).toThrow();

      expect(changes.map(c => c.operation)).toEqual(['createProportionalAsset', 'transferSharesToAccount']);
      expect(changes[1].holdings.map(h => [h.account, h.units])).toEqual([
        ['alice', 60],
        ['bob', 40]
      ]);
    });

    it('keeps a committed operation when the registry throws', () => {
      const localLogger = createLogger({ level: 'silent' });
      const errorSpy = vi.spyOn(localLogger, 'error');
      const local = new TradingEngine(state, currency, {
        logger: localLogger,
        stakeholderRegistry: {
          onHoldingsChanged: () => {
            throw new Error('registry offline');
          }
        }
      });

      const assetId = local.createProportionalAsset('alice', 'depot', 100);

      expect(local.getHolding(assetId, 'alice').units).toBe(100);
      expect(errorSpy).toHaveBeenCalledWith(
        expect.objectContaining({ operation: 'createProportionalAsset', assetId }),
        'stakeholder registry notification failed'
      );
    });
  });

  describe('conservation check', () => {
    it('rejects an operation that would leave an asset inconsistent', () => {
      const assetId = engine.createProportionalAsset('alice', 'mint', 100);
      // Corrupt the committed state directly so the next touch of the asset fails verification
      state.ledger.credit(assetId, 'mallory', 5);

      expectLedgerError(() => engine.transferSharesToAccount('alice', 'bob', assetId, 1), 'CONSERVATION_VIOLATION');
      expect(engine.getHolding(assetId, 'bob').units).toBe(0);
      expect(engine.verifyInvariants(assetId)).toMatchObject({ heldUnits: 105, conserved: false });
    });

    it('can be turned off', () => {
      const local = new TradingEngine(state, currency, { logger, verifyConservation: false });
      const assetId = local.createProportionalAsset('alice', 'mint', 100);
      state.ledger.credit(assetId, 'mallory', 5);

      local.transferSharesToAccount('alice', 'bob', assetId, 1);
      expect(local.getHolding(assetId, 'bob').units).toBe(1);
    });
  });
});
