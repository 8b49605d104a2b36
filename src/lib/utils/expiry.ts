// Expiry & stock classification: buckets, stock levels, cabinet filters and summaries
import type {
	CabinetFilter,
	CabinetStatusSummary,
	EmptyStateMessage,
	ExpiryAlert,
	ExpiryAlertLevel,
	ExpiryBucket,
	ExpirySeverity,
	MedicineCardView,
	MedicineRecord,
	StockLevel
} from '../types/cabinet.js';
import { DEFAULT_CABINET_CONFIG } from '../types/cabinet.js';
import { addDays, diffDays, formatMonthYear } from './calendar.js';

// --- Expiry ---

/**
 * Classify a medicine's expiry against `today` (both calendar dates).
 *
 * `expired` when the expiry date is strictly before today, `expiring_soon` when it
 * falls on or before `today + soonWindowDays`, otherwise `safe`. A medicine with no
 * expiry date is `safe`.
 */
export function classifyExpiry(
	medicine: Pick<MedicineRecord, 'expiryDate'>,
	today: string,
	soonWindowDays: number = DEFAULT_CABINET_CONFIG.soonWindowDays
): ExpiryBucket {
	const expiry = medicine.expiryDate;
	if (expiry === null) return 'safe';

	// Date keys compare lexicographically in calendar order
	if (expiry < today) return 'expired';
	if (expiry <= addDays(today, soonWindowDays)) return 'expiring_soon';
	return 'safe';
}

/** Days until expiry, negative once expired */
export function daysUntilExpiry(medicine: Pick<MedicineRecord, 'expiryDate'>, today: string): number | null {
	return medicine.expiryDate === null ? null : diffDays(today, medicine.expiryDate);
}

export function isExpired(medicine: Pick<MedicineRecord, 'expiryDate'>, today: string): boolean {
	return classifyExpiry(medicine, today) === 'expired';
}

export function expiryAlertLevel(
	medicine: Pick<MedicineRecord, 'expiryDate'>,
	today: string,
	soonWindowDays?: number
): ExpiryAlertLevel {
	if (medicine.expiryDate === null) return 'none';
	return classifyExpiry(medicine, today, soonWindowDays);
}

export function createExpiryAlert(
	medicine: MedicineRecord,
	today: string,
	soonWindowDays?: number
): ExpiryAlert {
	return {
		medicine,
		level: expiryAlertLevel(medicine, today, soonWindowDays),
		daysRemaining: daysUntilExpiry(medicine, today)
	};
}

export function expiryMessage(alert: Pick<ExpiryAlert, 'level' | 'daysRemaining'>): string {
	const days = alert.daysRemaining ?? 0;
	switch (alert.level) {
		case 'expired': {
			const daysPast = Math.abs(days);
			return `Expired ${daysPast === 0 ? 'today' : `${daysPast} days ago`}`;
		}
		case 'expiring_soon':
			return `Expires in ${days} days`;
		case 'safe':
			return alert.daysRemaining === null ? 'Valid' : `Valid for ${days} more days`;
		case 'none':
			return 'No expiry date set';
	}
}

export function expirySeverity(level: ExpiryAlertLevel): ExpirySeverity {
	switch (level) {
		case 'expired': return 'critical';
		case 'expiring_soon': return 'warning';
		case 'safe': return 'safe';
		case 'none': return 'unknown';
	}
}

/** Text of the badge on a medicine card */
export function expiryBadgeText(alert: Pick<ExpiryAlert, 'level' | 'daysRemaining'>): string {
	switch (alert.level) {
		case 'expired': return 'EXPIRED';
		case 'expiring_soon': return `${alert.daysRemaining ?? 0}d left`;
		default: return 'Safe';
	}
}

/** "Jan 2027", or "Not set" */
export function formatExpiryDate(medicine: Pick<MedicineRecord, 'expiryDate'>): string {
	return medicine.expiryDate === null ? 'Not set' : formatMonthYear(medicine.expiryDate);
}

/** Blocking modal appears once per strip: expired and not yet acknowledged */
export function shouldShowBlockingModal(medicine: MedicineRecord, today: string): boolean {
	return isExpired(medicine, today) && !medicine.expiryAlertShown;
}

/** Expired medicines can never be dosed, acknowledged or not */
export function shouldBlockDoseMarking(medicine: MedicineRecord, today: string): boolean {
	return isExpired(medicine, today);
}

export function shouldShowExpiryBanner(medicines: MedicineRecord[], today: string): boolean {
	return medicines.some((m) => isExpired(m, today));
}

// --- Stock ---

/** Low stock is `0 < tabletCount <= threshold`; zero is out of stock, not low */
export function isLowStock(
	medicine: Pick<MedicineRecord, 'tabletCount'>,
	threshold: number = DEFAULT_CABINET_CONFIG.lowStockThreshold
): boolean {
	return medicine.tabletCount > 0 && medicine.tabletCount <= threshold;
}

export function stockLevel(
	medicine: Pick<MedicineRecord, 'tabletCount'>,
	threshold: number = DEFAULT_CABINET_CONFIG.lowStockThreshold
): StockLevel {
	if (medicine.tabletCount <= 0) return 'out_of_stock';
	if (isLowStock(medicine, threshold)) return 'low';
	return 'in_stock';
}

// --- Cabinet views ---

export function filterMedicines(
	medicines: MedicineRecord[],
	filter: CabinetFilter,
	today: string,
	soonWindowDays?: number
): MedicineRecord[] {
	switch (filter) {
		case 'all':
			return medicines;
		case 'expired':
		case 'expiring_soon':
			return medicines.filter((m) => classifyExpiry(m, today, soonWindowDays) === filter);
	}
}

export function countByFilter(
	medicines: MedicineRecord[],
	today: string,
	soonWindowDays?: number
): Record<CabinetFilter, number> {
	const counts: Record<CabinetFilter, number> = { all: medicines.length, expiring_soon: 0, expired: 0 };
	for (const med of medicines) {
		const bucket = classifyExpiry(med, today, soonWindowDays);
		if (bucket !== 'safe') counts[bucket] += 1;
	}
	return counts;
}

const ATTENTION_ORDER: Record<ExpiryAlertLevel, number> = {
	expired: 0,
	expiring_soon: 1,
	safe: 2,
	none: 3
};

/** Expired first, then expiring soon; same level sorted by days remaining */
export function sortByAttention(
	medicines: MedicineRecord[],
	today: string,
	soonWindowDays?: number
): MedicineRecord[] {
	const alerts = medicines.map((m) => createExpiryAlert(m, today, soonWindowDays));
	alerts.sort((a, b) => {
		const levelCompare = ATTENTION_ORDER[a.level] - ATTENTION_ORDER[b.level];
		if (levelCompare !== 0) return levelCompare;
		return (a.daysRemaining ?? Number.MAX_SAFE_INTEGER) - (b.daysRemaining ?? Number.MAX_SAFE_INTEGER);
	});
	return alerts.map((a) => a.medicine);
}

export function summarizeCabinet(
	medicines: MedicineRecord[],
	today: string,
	soonWindowDays?: number,
	lowStockThreshold?: number
): CabinetStatusSummary {
	const counts = countByFilter(medicines, today, soonWindowDays);
	const lowStockCount = medicines.filter((m) => isLowStock(m, lowStockThreshold)).length;

	return {
		totalMedicines: medicines.length,
		expiredCount: counts.expired,
		expiringSoonCount: counts.expiring_soon,
		lowStockCount,
		needsAttention: counts.expired + counts.expiring_soon > 0,
		attentionCount: counts.expired + counts.expiring_soon + lowStockCount
	};
}

export function emptyStateMessage(filter: CabinetFilter): EmptyStateMessage {
	switch (filter) {
		case 'expired':
			return { title: 'No expired medicines', subtitle: 'Great! Your medicines are safe' };
		case 'expiring_soon':
			return { title: 'No medicines expiring soon', subtitle: 'Great! Your medicines are safe' };
		case 'all':
			return { title: 'Your cabinet is empty', subtitle: 'Scan a medicine to add it here' };
	}
}

/** Card view model for one medicine */
export function medicineCardView(
	medicine: MedicineRecord,
	today: string,
	soonWindowDays?: number,
	lowStockThreshold?: number
): MedicineCardView {
	const alert = createExpiryAlert(medicine, today, soonWindowDays);
	const expired = alert.level === 'expired';
	return {
		medicine,
		level: alert.level,
		severity: expirySeverity(alert.level),
		badgeText: expiryBadgeText(alert),
		expiryLabel: formatExpiryDate(medicine),
		stockLabel: `${medicine.tabletCount} tablets`,
		stock: stockLevel(medicine, lowStockThreshold),
		canTakeDose: !expired,
		opensExpiryAlert: expired
	};
}
