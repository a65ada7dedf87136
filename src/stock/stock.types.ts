export enum LotStatus {
    FRESH = 'fresh',
    NEAR_EXPIRY = 'near_expiry',
    PROMOTION = 'promotion',
    EXPIRED = 'expired',
}

export enum WasteReason {
    EXPIRED = 'expired',
    DEGRADED = 'degraded',
}

/** Which label wins when a lot is both a promotion candidate and near expiry. */
export type StatusPrecedence = 'promotion' | 'near-expiry';

export interface LedgerSettings {
    nearExpiryWindowDays: number;
    promotionWindowDays: number;
    promotionMinQuantity: number;
    quantityPrecision: number; // decimal places kept on quantities
    statusPrecedence: StatusPrecedence;
    promotionDiscountRate: number;
}

export const DEFAULT_LEDGER_SETTINGS: LedgerSettings = {
    nearExpiryWindowDays: 3,
    promotionWindowDays: 3,
    promotionMinQuantity: 1,
    quantityPrecision: 3,
    statusPrecedence: 'promotion',
    promotionDiscountRate: 0.5,
};

export interface NewLot {
    ingredientId: string;
    quantity: number;
    unitCostHt: number;
    purchaseDate: string; // YYYY-MM-DD
    expiryDate: string; // YYYY-MM-DD
    supplierId: string;
    qualityDegradationRate?: number;
    variantId?: string;
    lotNumber?: string;
}

/** Internal, mutable record. Only the ledger holds these. */
export interface LotRecord {
    readonly lotId: string;
    readonly sequence: number;
    readonly ingredientId: string;
    readonly supplierId: string;
    readonly unitCostHt: number;
    readonly purchaseDate: string;
    readonly expiryDate: string;
    readonly qualityDegradationRate: number;
    readonly initialQuantity: number;
    readonly variantId: string | null;
    readonly lotNumber: string | null;
    quantity: number;
}

export interface LotView {
    readonly lotId: string;
    readonly sequence: number;
    readonly ingredientId: string;
    readonly supplierId: string;
    readonly variantId: string | null;
    readonly lotNumber: string | null;
    readonly quantity: number;
    readonly initialQuantity: number;
    readonly unitCostHt: number;
    readonly totalValueHt: number;
    readonly purchaseDate: string;
    readonly expiryDate: string;
    readonly qualityDegradationRate: number;
    readonly status: LotStatus;
    readonly daysUntilExpiry: number;
    readonly shelfLifePercentage: number;
}

export interface WasteRecord {
    readonly ingredientId: string;
    readonly lotId: string;
    readonly lotNumber: string | null;
    readonly quantityLost: number;
    readonly unitCostHt: number;
    readonly totalLossValue: number;
    readonly reason: WasteReason;
    readonly eventDate: string;
}

export interface ConsumptionLine {
    readonly lotId: string;
    readonly quantityTaken: number;
    readonly unitCostHt: number;
    readonly lineCostHt: number;
    readonly purchaseDate: string;
    readonly expiryDate: string;
}

export interface ConsumptionResult {
    ingredientId: string;
    requested: number;
    obtained: number;
    shortfall: number;
    totalCostHt: number;
    lines: ConsumptionLine[];
}

export interface DailyReport {
    date: string;
    expiredLots: number;
    degradationLosses: Record<string, number>;
    totalWasteValue: number;
    wasteRecords: WasteRecord[];
    lotsNearExpiry: LotView[];
    promotionCandidates: LotView[];
}

export interface RotationAnalysis {
    ingredientId: string;
    lotsCount: number;
    totalQuantity: number;
    averageAgeDays: number;
    oldestLotDays: number;
    nearExpiryCount: number;
}

export interface WasteTotals {
    quantity: number;
    value: number;
}

export interface WasteSummary {
    records: number;
    totalValue: number;
    byReason: Record<WasteReason, WasteTotals>;
    byIngredient: Record<string, WasteTotals>;
}

export interface ReorderAlert {
    ingredientId: string;
    available: number;
    reorderPoint: number;
    shortfall: number;
}
