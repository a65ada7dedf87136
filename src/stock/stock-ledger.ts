import { v4 as uuidv4 } from 'uuid';
import {
  compareCalendarDates,
  daysBetween,
  isCalendarDate,
} from '../common/utils/calendar-date';
import {
  MONEY_PLACES,
  multiply,
  roundTo,
  subtract,
  sum,
} from '../common/utils/quantity';
import {
  daysUntilExpiry,
  isExpired,
  isNearExpiry,
  isPromotionCandidate,
  resolveLotStatus,
  shelfLifePercentage,
} from './lot-status';
import { LedgerContractError, LedgerValidationError } from './stock.errors';
import {
  DEFAULT_LEDGER_SETTINGS,
  WasteReason,
  type ConsumptionLine,
  type ConsumptionResult,
  type DailyReport,
  type LedgerSettings,
  type LotRecord,
  type LotView,
  type NewLot,
  type ReorderAlert,
  type RotationAnalysis,
  type WasteRecord,
  type WasteSummary,
} from './stock.types';

const fefoOrder = (a: LotRecord, b: LotRecord): number =>
  compareCalendarDates(a.expiryDate, b.expiryDate) ||
  compareCalendarDates(a.purchaseDate, b.purchaseDate) ||
  a.sequence - b.sequence;

const isNonNegative = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0;

const isBlank = (value: unknown): boolean =>
  typeof value !== 'string' || value.trim().length === 0;

/**
 * In-memory lot ledger for one game session.
 *
 * Every public method runs to completion synchronously, so a FEFO pass or a
 * daily batch is never interleaved with another operation on the same ledger.
 * Lots never leave the ledger by reference; callers get frozen `LotView`s.
 */
export class StockLedger {
  private readonly lots = new Map<string, LotRecord>();
  private readonly wasteLog: WasteRecord[] = [];
  private readonly reorderPoints = new Map<string, number>();
  private nextSequence = 1;
  private lastProcessed: string | null = null;

  constructor(
    private readonly config: LedgerSettings = DEFAULT_LEDGER_SETTINGS,
  ) {}

  get settings(): Readonly<LedgerSettings> {
    return this.config;
  }

  get lastProcessedDate(): string | null {
    return this.lastProcessed;
  }

  get size(): number {
    return this.lots.size;
  }

  /** The audit log is append-only; callers receive a copy. */
  get wasteRecords(): readonly WasteRecord[] {
    return [...this.wasteLog];
  }

  addLot(input: NewLot, today?: string): LotView {
    this.validateNewLot(input);

    const lot: LotRecord = {
      lotId: uuidv4(),
      sequence: this.nextSequence++,
      ingredientId: input.ingredientId,
      supplierId: input.supplierId,
      unitCostHt: input.unitCostHt,
      purchaseDate: input.purchaseDate,
      expiryDate: input.expiryDate,
      qualityDegradationRate: input.qualityDegradationRate ?? 0,
      initialQuantity: roundTo(input.quantity, this.config.quantityPrecision),
      variantId: input.variantId ?? null,
      lotNumber: input.lotNumber ?? null,
      quantity: roundTo(input.quantity, this.config.quantityPrecision),
    };
    this.lots.set(lot.lotId, lot);

    return this.toView(lot, this.referenceDate(today) ?? lot.purchaseDate);
  }

  consume(
    ingredientId: string,
    requestedQuantity: number,
    today?: string,
  ): ConsumptionResult {
    const places = this.config.quantityPrecision;
    if (!Number.isFinite(requestedQuantity) || requestedQuantity <= 0) {
      throw new LedgerContractError('stock.invalid_consume_quantity', {
        quantity: String(requestedQuantity),
      });
    }
    const requested = roundTo(requestedQuantity, places);
    if (requested <= 0) {
      throw new LedgerContractError('stock.invalid_consume_quantity', {
        quantity: String(requestedQuantity),
      });
    }
    const date = this.selectionDate(today);

    const candidates = [...this.lots.values()]
      .filter(
        (lot) =>
          lot.ingredientId === ingredientId &&
          lot.quantity > 0 &&
          !isExpired(lot, date),
      )
      .sort(fefoOrder);

    const lines: ConsumptionLine[] = [];
    let remaining = requested;
    for (const lot of candidates) {
      if (remaining <= 0) break;
      const taken = Math.min(lot.quantity, remaining);
      lot.quantity = subtract(lot.quantity, taken, places);
      remaining = subtract(remaining, taken, places);
      lines.push(
        Object.freeze({
          lotId: lot.lotId,
          quantityTaken: taken,
          unitCostHt: lot.unitCostHt,
          lineCostHt: multiply(taken, lot.unitCostHt, MONEY_PLACES),
          purchaseDate: lot.purchaseDate,
          expiryDate: lot.expiryDate,
        }),
      );
    }

    const obtained = sum(
      lines.map((l) => l.quantityTaken),
      places,
    );
    return {
      ingredientId,
      requested,
      obtained,
      shortfall: subtract(requested, obtained, places),
      totalCostHt: sum(
        lines.map((l) => l.lineCostHt),
        MONEY_PLACES,
      ),
      lines,
    };
  }

  getLots(today: string, ingredientId?: string): LotView[] {
    const date = this.requireDate(today);
    return [...this.lots.values()]
      .filter((lot) => !ingredientId || lot.ingredientId === ingredientId)
      .map((lot) => this.toView(lot, date));
  }

  getLot(lotId: string, today: string): LotView | undefined {
    const date = this.requireDate(today);
    const lot = this.lots.get(lotId);
    return lot ? this.toView(lot, date) : undefined;
  }

  getPromotionCandidates(today: string): LotView[] {
    const date = this.requireDate(today);
    return [...this.lots.values()]
      .filter((lot) => isPromotionCandidate(lot, date, this.config))
      .sort(fefoOrder)
      .map((lot) => this.toView(lot, date));
  }

  getLotsNearExpiry(today: string, warningDays?: number): LotView[] {
    const date = this.requireDate(today);
    const window = warningDays ?? this.config.nearExpiryWindowDays;
    if (!Number.isInteger(window) || window < 0) {
      throw new LedgerContractError('stock.invalid_warning_days', {
        days: String(warningDays),
      });
    }
    return [...this.lots.values()]
      .filter((lot) => isNearExpiry(lot, date, window))
      .sort(fefoOrder)
      .map((lot) => this.toView(lot, date));
  }

  /**
   * Ages every lot by one day: expired lots become waste and leave the
   * ledger, survivors lose `quantity * qualityDegradationRate`.
   * Must be called once per advancing day.
   */
  processDailyOperations(today: string): DailyReport {
    const date = this.requireDate(today);
    if (
      this.lastProcessed !== null &&
      compareCalendarDates(date, this.lastProcessed) <= 0
    ) {
      throw new LedgerContractError('stock.day_already_processed', {
        date,
        lastProcessed: this.lastProcessed,
      });
    }

    const places = this.config.quantityPrecision;
    const emitted: WasteRecord[] = [];
    const degradationLosses: Record<string, number> = {};
    let expiredLots = 0;

    for (const lot of [...this.lots.values()]) {
      if (isExpired(lot, date)) {
        emitted.push(this.recordWaste(lot, lot.quantity, WasteReason.EXPIRED, date));
        lot.quantity = 0;
        this.lots.delete(lot.lotId);
        expiredLots++;
        continue;
      }

      if (lot.qualityDegradationRate > 0 && lot.quantity > 0) {
        const loss = multiply(lot.quantity, lot.qualityDegradationRate, places);
        if (loss <= 0) continue;
        lot.quantity = subtract(lot.quantity, loss, places);
        emitted.push(this.recordWaste(lot, loss, WasteReason.DEGRADED, date));
        degradationLosses[lot.ingredientId] = sum(
          [degradationLosses[lot.ingredientId] ?? 0, loss],
          places,
        );
      }
    }

    this.lastProcessed = date;

    return {
      date,
      expiredLots,
      degradationLosses,
      totalWasteValue: sum(
        emitted.map((r) => r.totalLossValue),
        MONEY_PLACES,
      ),
      wasteRecords: emitted,
      lotsNearExpiry: this.getLotsNearExpiry(date),
      promotionCandidates: this.getPromotionCandidates(date),
    };
  }

  getAvailableQuantity(ingredientId: string, today?: string): number {
    const date = this.selectionDate(today);
    return sum(
      [...this.lots.values()]
        .filter(
          (lot) => lot.ingredientId === ingredientId && !isExpired(lot, date),
        )
        .map((lot) => lot.quantity),
      this.config.quantityPrecision,
    );
  }

  setReorderPoint(ingredientId: string, quantity: number): void {
    if (isBlank(ingredientId)) {
      throw new LedgerValidationError('lot.invalid_ingredient');
    }
    if (!isNonNegative(quantity)) {
      throw new LedgerValidationError('stock.invalid_reorder_point', {
        quantity: String(quantity),
      });
    }
    this.reorderPoints.set(ingredientId, quantity);
  }

  getReorderAlerts(today?: string): ReorderAlert[] {
    const alerts: ReorderAlert[] = [];
    for (const [ingredientId, reorderPoint] of this.reorderPoints) {
      const available = this.getAvailableQuantity(ingredientId, today);
      if (available <= reorderPoint) {
        alerts.push({
          ingredientId,
          available,
          reorderPoint,
          shortfall: subtract(reorderPoint, available, this.config.quantityPrecision),
        });
      }
    }
    return alerts;
  }

  getRotationAnalysis(ingredientId: string, today: string): RotationAnalysis {
    const date = this.requireDate(today);
    const lots = [...this.lots.values()].filter(
      (lot) => lot.ingredientId === ingredientId,
    );
    if (lots.length === 0) {
      return {
        ingredientId,
        lotsCount: 0,
        totalQuantity: 0,
        averageAgeDays: 0,
        oldestLotDays: 0,
        nearExpiryCount: 0,
      };
    }

    const ages = lots.map((lot) => daysBetween(lot.purchaseDate, date));
    return {
      ingredientId,
      lotsCount: lots.length,
      totalQuantity: sum(
        lots.map((lot) => lot.quantity),
        this.config.quantityPrecision,
      ),
      averageAgeDays: roundTo(sum(ages, 0) / lots.length, 2),
      oldestLotDays: Math.max(...ages),
      nearExpiryCount: lots.filter((lot) =>
        isNearExpiry(lot, date, this.config.nearExpiryWindowDays),
      ).length,
    };
  }

  summarizeWaste(): WasteSummary {
    const summary: WasteSummary = {
      records: this.wasteLog.length,
      totalValue: 0,
      byReason: {
        [WasteReason.EXPIRED]: { quantity: 0, value: 0 },
        [WasteReason.DEGRADED]: { quantity: 0, value: 0 },
      },
      byIngredient: {},
    };
    const places = this.config.quantityPrecision;

    for (const record of this.wasteLog) {
      const reason = summary.byReason[record.reason];
      reason.quantity = sum([reason.quantity, record.quantityLost], places);
      reason.value = sum([reason.value, record.totalLossValue], MONEY_PLACES);

      const ingredient = summary.byIngredient[record.ingredientId] ?? {
        quantity: 0,
        value: 0,
      };
      ingredient.quantity = sum([ingredient.quantity, record.quantityLost], places);
      ingredient.value = sum([ingredient.value, record.totalLossValue], MONEY_PLACES);
      summary.byIngredient[record.ingredientId] = ingredient;

      summary.totalValue = sum([summary.totalValue, record.totalLossValue], MONEY_PLACES);
    }
    return summary;
  }

  /** Discounted selling price a pricing layer can apply to a promotion candidate. */
  promotionPrice(
    basePrice: number,
    discountRate: number = this.config.promotionDiscountRate,
  ): number {
    if (!isNonNegative(basePrice)) {
      throw new LedgerValidationError('stock.invalid_price', {
        price: String(basePrice),
      });
    }
    if (!isNonNegative(discountRate) || discountRate > 1) {
      throw new LedgerValidationError('stock.invalid_discount_rate', {
        rate: String(discountRate),
      });
    }
    return multiply(basePrice, subtract(1, discountRate, 10), MONEY_PLACES);
  }

  private recordWaste(
    lot: LotRecord,
    quantityLost: number,
    reason: WasteReason,
    eventDate: string,
  ): WasteRecord {
    const record: WasteRecord = Object.freeze({
      ingredientId: lot.ingredientId,
      lotId: lot.lotId,
      lotNumber: lot.lotNumber,
      quantityLost,
      unitCostHt: lot.unitCostHt,
      totalLossValue: multiply(quantityLost, lot.unitCostHt, MONEY_PLACES),
      reason,
      eventDate,
    });
    this.wasteLog.push(record);
    return record;
  }

  private toView(lot: LotRecord, today: string): LotView {
    return Object.freeze({
      lotId: lot.lotId,
      sequence: lot.sequence,
      ingredientId: lot.ingredientId,
      supplierId: lot.supplierId,
      variantId: lot.variantId,
      lotNumber: lot.lotNumber,
      quantity: lot.quantity,
      initialQuantity: lot.initialQuantity,
      unitCostHt: lot.unitCostHt,
      totalValueHt: multiply(lot.quantity, lot.unitCostHt, MONEY_PLACES),
      purchaseDate: lot.purchaseDate,
      expiryDate: lot.expiryDate,
      qualityDegradationRate: lot.qualityDegradationRate,
      status: resolveLotStatus(lot, today, this.config),
      daysUntilExpiry: daysUntilExpiry(lot, today),
      shelfLifePercentage: roundTo(shelfLifePercentage(lot, today), 4),
    });
  }

  private requireDate(today: string): string {
    if (!isCalendarDate(today)) {
      throw new LedgerContractError('stock.invalid_date', { date: String(today) });
    }
    return today;
  }

  private referenceDate(today?: string): string | null {
    return today === undefined ? this.lastProcessed : this.requireDate(today);
  }

  // Expiry filtering needs a day: the explicit one, else the last processed one.
  private selectionDate(today?: string): string {
    const date = this.referenceDate(today);
    if (date === null) {
      throw new LedgerContractError('stock.date_required');
    }
    return date;
  }

  private validateNewLot(input: NewLot): void {
    if (isBlank(input.ingredientId)) {
      throw new LedgerValidationError('lot.invalid_ingredient');
    }
    if (isBlank(input.supplierId)) {
      throw new LedgerValidationError('lot.invalid_supplier');
    }
    if (!isNonNegative(input.quantity)) {
      throw new LedgerValidationError('lot.invalid_quantity', {
        quantity: String(input.quantity),
      });
    }
    if (!isNonNegative(input.unitCostHt)) {
      throw new LedgerValidationError('lot.invalid_cost', {
        cost: String(input.unitCostHt),
      });
    }
    if (!isCalendarDate(input.purchaseDate)) {
      throw new LedgerValidationError('lot.invalid_date', {
        date: String(input.purchaseDate),
      });
    }
    if (!isCalendarDate(input.expiryDate)) {
      throw new LedgerValidationError('lot.invalid_date', {
        date: String(input.expiryDate),
      });
    }
    if (compareCalendarDates(input.expiryDate, input.purchaseDate) < 0) {
      throw new LedgerValidationError('lot.expiry_before_purchase', {
        purchaseDate: input.purchaseDate,
        expiryDate: input.expiryDate,
      });
    }
    const rate = input.qualityDegradationRate ?? 0;
    if (!isNonNegative(rate) || rate > 1) {
      throw new LedgerValidationError('lot.invalid_degradation_rate', {
        rate: String(rate),
      });
    }
  }
}
