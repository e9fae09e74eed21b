/**
 * Trading Engine for proportional asset ownership
 * Orchestrates asset creation, offers, transfers, purchases and ownership claims,
 * applying each operation as a single all-or-nothing transaction
 */

import { ICurrencyConnector, PaymentResult } from '../connectors/CurrencyConnector';
import { IStakeholderRegistry, ITrustVerifier } from '../connectors/GovernanceConnector';
import { AccountId, Asset, AssetId } from '../models/Asset';
import { AuditDetails, AuditEvent, AuditEventType } from '../models/AuditEvent';
import { Holding } from '../models/Holding';
import { Offer, OfferId, OfferStatus } from '../models/Offer';
import { InputValidator, ValidationRule } from '../security/InputValidator';
import { ErrorContext, errorMessage, isLedgerError, ledgerError } from '../utils/ErrorHandler';
import { createLogger, Logger } from '../utils/logger';
import { totalPrice } from '../utils/unitMath';
import { AuditService } from './AuditService';
import { LedgerState } from './LedgerState';

export interface TradingEngineOptions {
  /** Check conservation and lock consistency of every touched asset before commit */
  verifyConservation?: boolean;
  /** Omit to run without an audit trail */
  auditService?: AuditService;
  logger?: Logger;
  trustVerifier?: ITrustVerifier;
  stakeholderRegistry?: IStakeholderRegistry;
}

export interface InvariantReport {
  assetId: AssetId;
  totalUnits: number;
  heldUnits: number;
  conserved: boolean;
  locksConsistent: boolean;
  violations: string[];
}

interface PendingEvent {
  eventType: AuditEventType;
  accountId?: AccountId;
  assetId?: AssetId;
  details: AuditDetails;
}

/**
 * What an operation did, published only once it has committed
 */
class OperationEffects {
  readonly events: PendingEvent[] = [];
  readonly touched: Map<AssetId, Set<AccountId>> = new Map();

  touch(assetId: AssetId, ...accounts: AccountId[]): void {
    const set = this.touched.get(assetId) ?? new Set<AccountId>();
    accounts.forEach(account => set.add(account));
    this.touched.set(assetId, set);
  }

  emit(event: PendingEvent): void {
    this.events.push(event);
  }
}

type OperationContext = Omit<ErrorContext, 'operation' | 'component' | 'timestamp'>;

export class TradingEngine {
  private readonly state: LedgerState;
  private readonly currency: ICurrencyConnector;
  private readonly validator = new InputValidator();
  private readonly verifyConservation: boolean;
  private readonly auditService?: AuditService;
  private readonly logger: Logger;
  private readonly trustVerifier?: ITrustVerifier;
  private readonly stakeholderRegistry?: IStakeholderRegistry;

  constructor(state: LedgerState, currency: ICurrencyConnector, options: TradingEngineOptions = {}) {
    this.state = state;
    this.currency = currency;
    this.verifyConservation = options.verifyConservation ?? true;
    this.auditService = options.auditService;
    this.logger = options.logger ?? createLogger();
    this.trustVerifier = options.trustVerifier;
    this.stakeholderRegistry = options.stakeholderRegistry;
  }

  /**
   * Registers a new asset with the creator holding every unit
   */
  createProportionalAsset(creator: AccountId, metadata: string, totalUnits: number): AssetId {
    const operation = 'createProportionalAsset';
    return this.execute(operation, { accountId: creator }, effects => {
      this.ensureValid(operation, { creator }, [InputValidator.accountRule('creator')]);

      const asset = this.state.registry.create(creator, metadata, totalUnits);

      effects.touch(asset.id, creator);
      effects.emit({
        eventType: 'ASSET_CREATED',
        accountId: creator,
        assetId: asset.id,
        details: { totalUnits: asset.totalUnits, fingerprint: asset.fingerprint }
      });
      return asset.id;
    });
  }

  /**
   * Opens a fixed-price sell offer, locking the offered units
   */
  offerShares(seller: AccountId, assetId: AssetId, units: number, unitPrice: number): OfferId {
    const operation = 'offerShares';
    return this.execute(operation, { accountId: seller, assetId }, effects => {
      this.ensureValid(operation, { seller, units, unitPrice }, [
        InputValidator.accountRule('seller'),
        InputValidator.unitsRule('units'),
        InputValidator.priceRule('unitPrice')
      ]);
      this.requireActiveAsset(operation, assetId, seller);
      this.ensureTrusted(operation, seller, assetId);

      const offer = this.state.offers.open(assetId, seller, units, unitPrice);

      effects.touch(assetId, seller);
      effects.emit({
        eventType: 'SHARES_OFFERED',
        accountId: seller,
        assetId,
        details: { offerId: offer.id, units, unitPrice }
      });
      return offer.id;
    });
  }

  /**
   * Moves unlocked units between accounts without payment
   */
  transferSharesToAccount(sender: AccountId, recipient: AccountId, assetId: AssetId, units: number): void {
    const operation = 'transferSharesToAccount';
    this.execute(operation, { accountId: sender, assetId }, effects => {
      this.ensureValid(operation, { sender, recipient, units }, [
        InputValidator.accountRule('sender'),
        InputValidator.accountRule('recipient'),
        InputValidator.unitsRule('units')
      ]);
      this.requireActiveAsset(operation, assetId, sender);

      const available = this.state.ledger.availableUnits(assetId, sender);
      if (units > available) {
        throw ledgerError(
          'INSUFFICIENT_UNITS',
          `Cannot transfer ${units} units: ${sender} has ${available} unlocked`,
          { operation, component: 'TradingEngine', accountId: sender, assetId }
        );
      }

      // Self-transfer is validated above and otherwise leaves the ledger untouched
      if (sender !== recipient) {
        this.state.ledger.transfer(assetId, sender, recipient, units);
      }

      effects.touch(assetId, sender, recipient);
      effects.emit({
        eventType: 'SHARES_TRANSFERRED',
        accountId: sender,
        assetId,
        details: { from: sender, to: recipient, units }
      });
    });
  }

  /**
   * Buys units from an open offer; units and payment move together or not at all
   */
  buyShares(buyer: AccountId, offerId: OfferId, units: number): void {
    const operation = 'buyShares';
    this.execute(operation, { accountId: buyer, offerId }, effects => {
      this.ensureValid(operation, { buyer, units }, [
        InputValidator.accountRule('buyer'),
        InputValidator.unitsRule('units')
      ]);

      const offer = this.state.offers.get(offerId);
      const { assetId, seller } = offer;
      this.requireActiveAsset(operation, assetId, buyer);

      if (buyer === seller) {
        throw ledgerError('SELF_PURCHASE', `${buyer} cannot buy from their own offer ${offerId}`, {
          operation,
          component: 'TradingEngine',
          accountId: buyer,
          assetId,
          offerId
        });
      }
      this.ensureTrusted(operation, buyer, assetId);

      const price = totalPrice(units, offer.unitPrice);
      if (price === null) {
        throw ledgerError('INVALID_AMOUNT', `Price of ${units} units at ${offer.unitPrice} exceeds the safe integer range`, {
          operation,
          component: 'TradingEngine',
          accountId: buyer,
          assetId,
          offerId
        });
      }

      const settlement = this.state.offers.settle(offerId, buyer, units);
      this.state.ledger.unlock(assetId, seller, units);
      this.state.ledger.transfer(assetId, seller, buyer, units);

      // Staged writes above stay invisible until the payment has succeeded
      const transactionId = this.collectPayment(operation, buyer, seller, price, { assetId, offerId });

      effects.touch(assetId, seller, buyer);
      effects.emit({
        eventType: 'SHARES_PURCHASED',
        accountId: buyer,
        assetId,
        details: {
          offerId,
          buyer,
          seller,
          units,
          unitPrice: settlement.unitPrice,
          totalPrice: price,
          paymentTransactionId: transactionId ?? null
        }
      });
      if (settlement.status === 'filled') {
        effects.emit({ eventType: 'OFFER_FILLED', accountId: seller, assetId, details: { offerId } });
      }
    });
  }

  /**
   * Withdraws an open offer and releases its remaining locked units
   */
  cancelOffer(requester: AccountId, offerId: OfferId): void {
    const operation = 'cancelOffer';
    this.execute(operation, { accountId: requester, offerId }, effects => {
      this.ensureValid(operation, { requester }, [InputValidator.accountRule('requester')]);

      const offer = this.state.offers.cancel(offerId, requester);

      effects.touch(offer.assetId, requester);
      effects.emit({
        eventType: 'OFFER_CANCELLED',
        accountId: requester,
        assetId: offer.assetId,
        details: { offerId, unitsReleased: offer.unitsRemaining }
      });
    });
  }

  /**
   * Converts a 100% holding into sole ownership; the asset stops trading
   */
  claimOwnership(claimant: AccountId, assetId: AssetId): void {
    const operation = 'claimOwnership';
    this.execute(operation, { accountId: claimant, assetId }, effects => {
      this.ensureValid(operation, { claimant }, [InputValidator.accountRule('claimant')]);
      const asset = this.requireActiveAsset(operation, assetId, claimant);

      const holding = this.state.ledger.getHolding(assetId, claimant);
      if (holding.units !== asset.totalUnits) {
        throw ledgerError(
          'INSUFFICIENT_OWNERSHIP',
          `${claimant} holds ${holding.units} of ${asset.totalUnits} units`,
          { operation, component: 'TradingEngine', accountId: claimant, assetId }
        );
      }

      // The claimant holds every unit, so every open offer on the asset is theirs
      for (const offer of this.state.offers.listByAsset(assetId, 'open')) {
        const cancelled = this.state.offers.cancel(offer.id, claimant);
        effects.emit({
          eventType: 'OFFER_CANCELLED',
          accountId: claimant,
          assetId,
          details: { offerId: cancelled.id, unitsReleased: cancelled.unitsRemaining }
        });
      }

      this.state.registry.markClaimed(assetId, claimant);

      effects.touch(assetId, claimant);
      effects.emit({
        eventType: 'OWNERSHIP_CLAIMED',
        accountId: claimant,
        assetId,
        details: { totalUnits: asset.totalUnits }
      });
    });
  }

  // Read views are copies; stored records change only through the operations above

  getAsset(assetId: AssetId): Asset {
    return { ...this.state.registry.get(assetId) };
  }

  listAssets(): Asset[] {
    return this.state.registry.list().map(asset => ({ ...asset }));
  }

  getHolding(assetId: AssetId, account: AccountId): Holding {
    return { ...this.state.ledger.getHolding(assetId, account) };
  }

  getOffer(offerId: OfferId): Offer {
    return { ...this.state.offers.get(offerId) };
  }

  listOffers(assetId: AssetId, status?: OfferStatus): Offer[] {
    return this.state.offers.listByAsset(assetId, status).map(offer => ({ ...offer }));
  }

  /**
   * The claimed owner, or an account holding more than half of the units
   */
  getMainOwner(assetId: AssetId): AccountId | undefined {
    const asset = this.state.registry.get(assetId);
    if (asset.status === 'claimed') {
      return asset.owner;
    }
    return this.state.ledger
      .holdingsOf(assetId)
      .find(holding => holding.units * 2 > asset.totalUnits)?.account;
  }

  getEvents(): AuditEvent[] {
    return this.auditService?.getAllEvents() ?? [];
  }

  /**
   * Checks unit conservation and that every seller's locked units match their open offers
   */
  verifyInvariants(assetId: AssetId): InvariantReport {
    const asset = this.state.registry.get(assetId);
    const holdings = this.state.ledger.holdingsOf(assetId);
    const heldUnits = holdings.reduce((total, holding) => total + holding.units, 0);
    const violations: string[] = [];

    const conserved = heldUnits === asset.totalUnits;
    if (!conserved) {
      violations.push(`held units ${heldUnits} differ from total units ${asset.totalUnits}`);
    }

    if (asset.status === 'claimed') {
      const ownerUnits = asset.owner ? this.state.ledger.getHolding(assetId, asset.owner).units : 0;
      if (ownerUnits !== asset.totalUnits) {
        violations.push(`claimed owner holds ${ownerUnits} of ${asset.totalUnits} units`);
      }
    }

    const offeredBySeller = new Map<AccountId, number>();
    for (const offer of this.state.offers.listByAsset(assetId, 'open')) {
      offeredBySeller.set(offer.seller, (offeredBySeller.get(offer.seller) ?? 0) + offer.unitsRemaining);
    }

    let locksConsistent = true;
    for (const holding of holdings) {
      if (holding.lockedUnits < 0 || holding.lockedUnits > holding.units) {
        locksConsistent = false;
        violations.push(`${holding.account} has ${holding.lockedUnits} locked of ${holding.units} units`);
      }
      const offered = offeredBySeller.get(holding.account) ?? 0;
      if (offered !== holding.lockedUnits) {
        locksConsistent = false;
        violations.push(`${holding.account} has ${holding.lockedUnits} locked but ${offered} on open offers`);
      }
      offeredBySeller.delete(holding.account);
    }
    for (const [seller, offered] of offeredBySeller) {
      locksConsistent = false;
      violations.push(`${seller} has ${offered} units on open offers but holds none`);
    }

    return { assetId, totalUnits: asset.totalUnits, heldUnits, conserved, locksConsistent, violations };
  }

  /**
   * Runs one operation inside a ledger transaction and publishes its effects after commit
   */
  private execute<T>(operation: string, context: OperationContext, work: (effects: OperationEffects) => T): T {
    const effects = new OperationEffects();
    let result: T;

    try {
      result = this.state.transaction(operation, () => {
        const value = work(effects);
        if (this.verifyConservation) {
          this.assertInvariants(operation, effects);
        }
        return value;
      });
    } catch (error) {
      this.recordRejection(operation, context, error);
      throw error;
    }

    this.publish(operation, effects);
    return result;
  }

  private assertInvariants(operation: string, effects: OperationEffects): void {
    for (const assetId of effects.touched.keys()) {
      const report = this.verifyInvariants(assetId);
      if (report.violations.length > 0) {
        throw ledgerError('CONSERVATION_VIOLATION', report.violations.join('; '), {
          operation,
          component: 'TradingEngine',
          assetId,
          metadata: { heldUnits: report.heldUnits, totalUnits: report.totalUnits }
        });
      }
    }
  }

  private publish(operation: string, effects: OperationEffects): void {
    for (const event of effects.events) {
      this.auditService?.record(event.eventType, event.details, event.accountId, event.assetId);
      this.logger.info(
        { operation, eventType: event.eventType, accountId: event.accountId, assetId: event.assetId, ...event.details },
        'ledger operation committed'
      );
    }

    if (!this.stakeholderRegistry) {
      return;
    }
    for (const [assetId, accounts] of effects.touched) {
      const holdings = Array.from(accounts, account => this.state.ledger.getHolding(assetId, account));
      try {
        this.stakeholderRegistry.onHoldingsChanged({ operation, assetId, holdings });
      } catch (error) {
        // The operation has committed; registry failures are reported, not propagated
        this.logger.error({ err: error, operation, assetId }, 'stakeholder registry notification failed');
      }
    }
  }

  private recordRejection(operation: string, context: OperationContext, error: unknown): void {
    const code = isLedgerError(error) ? error.code : 'INTERNAL_ERROR';
    const message = errorMessage(error);

    if (isLedgerError(error)) {
      this.logger.warn({ operation, code, ...context }, `ledger operation rejected: ${message}`);
    } else {
      this.logger.error({ err: error, operation, ...context }, 'ledger operation failed unexpectedly');
    }

    this.auditService?.record(
      'OPERATION_REJECTED',
      { operation, code, message, ...(context.offerId && { offerId: context.offerId }) },
      context.accountId,
      context.assetId
    );
  }

  private requireActiveAsset(operation: string, assetId: AssetId, accountId: AccountId): Asset {
    const asset = this.state.registry.get(assetId);
    if (asset.status !== 'active') {
      throw ledgerError('ASSET_CLAIMED', `Asset ${assetId} has been claimed and no longer trades`, {
        operation,
        component: 'TradingEngine',
        accountId,
        assetId
      });
    }
    return asset;
  }

  private ensureTrusted(operation: string, accountId: AccountId, assetId: AssetId): void {
    if (this.trustVerifier && !this.trustVerifier.isTrusted(accountId)) {
      throw ledgerError('UNTRUSTED_ACCOUNT', `${accountId} failed the trust check`, {
        operation,
        component: 'TradingEngine',
        accountId,
        assetId
      });
    }
  }

  private ensureValid(operation: string, data: Record<string, unknown>, rules: ValidationRule[]): void {
    const result = this.validator.validate(data, rules);
    if (!result.isValid) {
      const [first] = result.errors;
      throw ledgerError(first.code, result.errors.map(e => e.message).join('; '), {
        operation,
        component: 'TradingEngine',
        metadata: { fields: result.errors.map(e => e.field) }
      });
    }
  }

  private collectPayment(
    operation: string,
    buyer: AccountId,
    seller: AccountId,
    amount: number,
    context: { assetId: AssetId; offerId: OfferId }
  ): string | undefined {
    const errorContext = { operation, component: 'TradingEngine', accountId: buyer, ...context };

    let result: PaymentResult;
    try {
      result = this.currency.pay(buyer, seller, amount);
    } catch (error) {
      throw ledgerError('PAYMENT_FAILED', `Payment of ${amount} from ${buyer} to ${seller} failed: ${errorMessage(error)}`, errorContext, {
        originalError: error instanceof Error ? error : undefined
      });
    }

    if (!result.success) {
      throw ledgerError(
        'PAYMENT_FAILED',
        `Payment of ${amount} from ${buyer} to ${seller} was declined: ${result.error ?? 'no reason given'}`,
        errorContext
      );
    }
    return result.transactionId;
  }
}
