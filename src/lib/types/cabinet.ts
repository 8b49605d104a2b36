// Medicine cabinet types: records, dose logs, expiry classification, summaries

/** Medicine in the user's cabinet (users/{uid}/medicines/{id}) */
export interface MedicineRecord {
	id: string;
	drugId: string;
	name: string;
	category: string | null;
	tabletCount: number;
	/** Calendar date (YYYY-MM-DD); null when no expiry was captured */
	expiryDate: string | null;
	expiryAlertShown: boolean;
	dosesPerDay: number;
	/** Dose slot labels, e.g. ["08:00", "20:00"] */
	scheduleTimes: string[];
	foodWarnings: string[];
	addedAt: string;
	updatedAt: string | null;
}

/** Logged dose (users/{uid}/dose_logs/{id}), append-only */
export interface DoseLogEntry {
	id: string;
	medicineId: string;
	medicineName: string;
	scheduledTime: string | null;
	quantityTaken: number;
	takenAt: string;
}

/** Dose about to be recorded */
export interface DoseRequest {
	medicineId: string;
	medicineName: string;
	quantity: number;
	scheduledTime: string | null;
}

export type ExpiryBucket = 'safe' | 'expiring_soon' | 'expired';

/** Alert level adds `none` for medicines without an expiry date */
export type ExpiryAlertLevel = ExpiryBucket | 'none';

export type ExpirySeverity = 'critical' | 'warning' | 'safe' | 'unknown';

export type StockLevel = 'out_of_stock' | 'low' | 'in_stock';

/** Cabinet filter tabs (mutually exclusive) */
export type CabinetFilter = 'all' | 'expiring_soon' | 'expired';

export const CABINET_FILTERS: readonly CabinetFilter[] = ['all', 'expiring_soon', 'expired'] as const;

export const CABINET_FILTER_LABELS: Record<CabinetFilter, string> = {
	all: 'All',
	expiring_soon: 'Expiring Soon',
	expired: 'Expired'
};

export interface ExpiryAlert {
	medicine: MedicineRecord;
	level: ExpiryAlertLevel;
	/** Days until expiry, negative once expired; null without an expiry date */
	daysRemaining: number | null;
}

export interface CabinetStatusSummary {
	totalMedicines: number;
	expiredCount: number;
	expiringSoonCount: number;
	lowStockCount: number;
	needsAttention: boolean;
	attentionCount: number;
}

/** Everything a medicine card displays */
export interface MedicineCardView {
	medicine: MedicineRecord;
	level: ExpiryAlertLevel;
	severity: ExpirySeverity;
	badgeText: string;
	expiryLabel: string;
	stockLabel: string;
	stock: StockLevel;
	/** Take Dose is offered only for medicines that have not expired */
	canTakeDose: boolean;
	/** Tapping an expired card reopens its expiry alert */
	opensExpiryAlert: boolean;
}

/** Initial values of the new strip form */
export interface StripFormDefaults {
	expiryDate: string;
	quantity: number;
	presets: number[];
}

export interface EmptyStateMessage {
	title: string;
	subtitle: string;
}

/** Quantity button in the take-dose sheet */
export interface DoseQuantityOption {
	quantity: number;
	disabled: boolean;
}

/** Outcome of applying a dose to a medicine's stock */
export interface DoseOutcome {
	tabletCount: number;
	lowStock: boolean;
}

/** Cabinet tunables */
export interface CabinetConfig {
	soonWindowDays: number;
	lowStockThreshold: number;
	todayLogScanLimit: number;
	doseQuantityOptions: number[];
	stripQuantityPresets: number[];
	defaultStripQuantity: number;
	stripMonthsAhead: number;
}

export const DEFAULT_CABINET_CONFIG: Readonly<CabinetConfig> = {
	soonWindowDays: 30,
	lowStockThreshold: 5,
	todayLogScanLimit: 100,
	doseQuantityOptions: [1, 2, 3],
	stripQuantityPresets: [10, 15],
	defaultStripQuantity: 10,
	stripMonthsAhead: 6
};

/** Bounds of the custom strip quantity stepper */
export const STRIP_QUANTITY_MIN = 1;
export const STRIP_QUANTITY_MAX = 100;

/** A slot counts as upcoming until 30 minutes after its time */
export const SLOT_GRACE_MINUTES = 30;
