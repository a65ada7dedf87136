import {
  Injectable,
  Inject,
  Logger,
  BadRequestException,
  ConflictException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { LogsService } from '../logs/logs.service';
import type { LogActor, LogMeta } from '../logs/logs.types';
import { StockLedger } from './stock-ledger';
import { LedgerContractError, LedgerValidationError } from './stock.errors';
import { LEDGER_SETTINGS } from './stock.constants';
import type {
  ConsumptionResult,
  DailyReport,
  LedgerSettings,
  LotView,
  ReorderAlert,
  RotationAnalysis,
  WasteReason,
  WasteRecord,
  WasteSummary,
} from './stock.types';
import { AddLotDto } from './dto/add-lot.dto';
import { ConsumeStockDto } from './dto/consume-stock.dto';
import { ReorderPointDto } from './dto/reorder-point.dto';

// Precondition failures about time are conflicts with ledger state, the rest are bad input.
const CONFLICT_KEYS = new Set(['stock.day_already_processed']);

/**
 * Holds one ledger per game session. Sessions never share lots.
 *
 * Each ledger call completes synchronously before the audit write is
 * awaited, so concurrent requests on one session cannot interleave inside
 * a FEFO pass or a daily batch.
 */
@Injectable()
export class StockService {
  private readonly logger = new Logger(StockService.name);
  private readonly ledgers = new Map<string, StockLedger>();

  constructor(
    @Inject(LEDGER_SETTINGS) private readonly settings: LedgerSettings,
    @Inject(LogsService) private readonly logsService: LogsService,
  ) {}

  get sessionCount(): number {
    return this.ledgers.size;
  }

  async addLot(
    sessionId: string,
    actor: LogActor,
    dto: AddLotDto,
  ): Promise<LotView> {
    const { today, ...lot } = dto;
    const view = this.run(() => this.ledgerFor(sessionId).addLot(lot, today));

    await this.audit(sessionId, actor, 'lot.add', 'lot', view.lotId, {
      ingredientId: view.ingredientId,
      quantity: view.quantity,
      unitCostHt: view.unitCostHt,
      expiryDate: view.expiryDate,
    });
    return view;
  }

  listLots(sessionId: string, today: string, ingredientId?: string): LotView[] {
    return this.run(() => this.peek(sessionId).getLots(today, ingredientId));
  }

  getLot(sessionId: string, lotId: string, today: string): LotView {
    const lot = this.run(() => this.peek(sessionId).getLot(lotId, today));
    if (!lot) {
      throw new NotFoundException({ key: 'lot.not_found', vars: { lotId } });
    }
    return lot;
  }

  async consume(
    sessionId: string,
    actor: LogActor,
    dto: ConsumeStockDto,
  ): Promise<ConsumptionResult> {
    const result = this.run(() =>
      this.ledgerFor(sessionId).consume(dto.ingredientId, dto.quantity, dto.today),
    );

    if (result.shortfall > 0) {
      this.logger.debug(
        `Shortfall of ${result.shortfall} on ${dto.ingredientId} in session ${sessionId}`,
      );
    }
    await this.audit(sessionId, actor, 'stock.consume', 'stock', dto.ingredientId, {
      requested: result.requested,
      obtained: result.obtained,
      lots: result.lines.map((l) => l.lotId),
    });
    return result;
  }

  getPromotionCandidates(sessionId: string, today: string): LotView[] {
    return this.run(() => this.peek(sessionId).getPromotionCandidates(today));
  }

  getPromotionPrice(sessionId: string, basePrice: number, discountRate?: number) {
    const ledger = this.peek(sessionId);
    const rate = discountRate ?? ledger.settings.promotionDiscountRate;
    return {
      basePrice,
      discountRate: rate,
      promotionPrice: this.run(() => ledger.promotionPrice(basePrice, rate)),
    };
  }

  getLotsNearExpiry(sessionId: string, today: string, days?: number): LotView[] {
    return this.run(() => this.peek(sessionId).getLotsNearExpiry(today, days));
  }

  async processDailyOperations(
    sessionId: string,
    actor: LogActor,
    today: string,
  ): Promise<DailyReport> {
    const report = this.run(() =>
      this.ledgerFor(sessionId).processDailyOperations(today),
    );

    this.logger.log(
      `Session ${sessionId} processed ${today}: ${report.expiredLots} expired lot(s), ${report.wasteRecords.length} waste record(s), value ${report.totalWasteValue}`,
    );
    await this.audit(sessionId, actor, 'stock.daily_operations', 'stock', null, {
      date: report.date,
      expiredLots: report.expiredLots,
      degradationLosses: report.degradationLosses,
      totalWasteValue: report.totalWasteValue,
    });
    return report;
  }

  getWasteRecords(
    sessionId: string,
    filters: { ingredientId?: string; reason?: WasteReason } = {},
  ): WasteRecord[] {
    return this.peek(sessionId).wasteRecords.filter(
      (r) =>
        (!filters.ingredientId || r.ingredientId === filters.ingredientId) &&
        (!filters.reason || r.reason === filters.reason),
    );
  }

  getWasteSummary(sessionId: string): WasteSummary {
    return this.peek(sessionId).summarizeWaste();
  }

  getAvailableQuantity(sessionId: string, ingredientId: string, today?: string) {
    const available = this.run(() =>
      this.peek(sessionId).getAvailableQuantity(ingredientId, today),
    );
    return { ingredientId, available };
  }

  getRotationAnalysis(
    sessionId: string,
    ingredientId: string,
    today: string,
  ): RotationAnalysis {
    return this.run(() =>
      this.peek(sessionId).getRotationAnalysis(ingredientId, today),
    );
  }

  async setReorderPoint(
    sessionId: string,
    actor: LogActor,
    dto: ReorderPointDto,
  ) {
    this.run(() =>
      this.ledgerFor(sessionId).setReorderPoint(dto.ingredientId, dto.quantity),
    );
    await this.audit(sessionId, actor, 'stock.reorder_point', 'stock', dto.ingredientId, {
      quantity: dto.quantity,
    });
    return { ingredientId: dto.ingredientId, reorderPoint: dto.quantity };
  }

  getReorderAlerts(sessionId: string, today?: string): ReorderAlert[] {
    return this.run(() => this.peek(sessionId).getReorderAlerts(today));
  }

  async closeSession(sessionId: string, actor: LogActor) {
    const closed = this.ledgers.delete(sessionId);
    if (closed) {
      await this.audit(sessionId, actor, 'stock.session_close', 'stock', null);
    }
    return { sessionId, closed };
  }

  private ledgerFor(sessionId: string): StockLedger {
    let ledger = this.ledgers.get(sessionId);
    if (!ledger) {
      ledger = new StockLedger(this.settings);
      this.ledgers.set(sessionId, ledger);
      this.logger.debug(`Opened ledger for session ${sessionId}`);
    }
    return ledger;
  }

  // Reads on a session that never received stock see an empty ledger without registering one.
  private peek(sessionId: string): StockLedger {
    return this.ledgers.get(sessionId) ?? new StockLedger(this.settings);
  }

  private run<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  private toHttpException(error: unknown): HttpException {
    if (error instanceof HttpException) {
      return error;
    }
    if (error instanceof LedgerValidationError) {
      return new BadRequestException({ key: error.key, vars: error.vars });
    }
    if (error instanceof LedgerContractError) {
      return CONFLICT_KEYS.has(error.key)
        ? new ConflictException({ key: error.key, vars: error.vars })
        : new BadRequestException({ key: error.key, vars: error.vars });
    }
    this.logger.error('Stock operation failed', error);
    return new InternalServerErrorException({ key: 'stock.operation_failed' });
  }

  private async audit(
    sessionId: string,
    actor: LogActor,
    action: string,
    resource: string,
    resourceId: string | null,
    meta?: LogMeta,
  ): Promise<void> {
    try {
      await this.logsService.record(sessionId, actor, action, resource, resourceId, meta);
    } catch (e) {
      this.logger.warn(`Failed to record ${action} log`, e);
    }
  }
}
