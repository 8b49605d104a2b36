// Cabinet store: the medicine list and every user action on it
//
// Flow per action: fetch -> render -> user action -> mutate -> re-fetch.
// Nothing is updated optimistically; a failed mutation leaves the state as it was.
import { writable, derived, get } from 'svelte/store';
import type {
	CabinetConfig,
	CabinetFilter,
	MedicineRecord,
	StripFormDefaults
} from '../types/cabinet.js';
import { DEFAULT_CABINET_CONFIG } from '../types/cabinet.js';
import type { InventoryResult, InventoryStore } from '../api/inventory.js';
import { describeFailure } from '../api/inventory.js';
import { resolveCabinetConfig } from '../config.js';
import { toDateKey, isDateKey } from '../utils/calendar.js';
import {
	countByFilter,
	emptyStateMessage,
	filterMedicines,
	medicineCardView,
	shouldBlockDoseMarking,
	shouldShowBlockingModal,
	shouldShowExpiryBanner,
	summarizeCabinet
} from '../utils/expiry.js';
import { applyDose } from '../utils/dose.js';
import { defaultStripExpiry } from '../utils/strip.js';
import {
	loadCabinetFilter,
	loadLastKnownCabinet,
	saveCabinetFilter,
	saveLastKnownCabinet
} from '../utils/storage.js';
import { createLogger } from '../utils/logger.js';
import { pushNotice } from './notices.js';
import { doseSheet, canConfirm, closeDoseSheet, showDoseSheet } from './dose-sheet.js';

const log = createLogger('cabinet');

// === STATE ===

export type CabinetAction = 'take_dose' | 'restock' | 'remove' | 'acknowledge_alert';

export type CabinetState =
	| { status: 'idle' }
	| { status: 'loading'; medicines: MedicineRecord[] }
	| { status: 'ready'; medicines: MedicineRecord[]; loadedAt: string }
	| { status: 'mutating'; medicines: MedicineRecord[]; action: CabinetAction }
	| { status: 'error'; medicines: MedicineRecord[]; message: string };

export type CabinetActionResult =
	| { ok: true }
	| { ok: false; reason: 'not_open' | 'busy' | 'not_found' | 'blocked' | 'invalid' | 'failed'; message: string };

export interface OpenCabinetOptions {
	inventory: InventoryStore;
	userId: string;
	config?: Partial<CabinetConfig>;
	clock?: () => Date;
}

interface CabinetSession {
	inventory: InventoryStore;
	userId: string;
	config: CabinetConfig;
	clock: () => Date;
}

export const cabinetState = writable<CabinetState>({ status: 'idle' });

export const cabinetFilter = writable<CabinetFilter>('all');

export const cabinetConfig = writable<CabinetConfig>(resolveCabinetConfig());

/** Calendar date all classifications use; refreshed on every fetch */
export const today = writable<string>(toDateKey(new Date()));

let session: CabinetSession | null = null;

// === DERIVED ===

export const cabinetMedicines = derived(cabinetState, ($s) =>
	$s.status === 'idle' ? [] : $s.medicines
);

export const isCabinetLoading = derived(cabinetState, ($s) => $s.status === 'loading');

export const isCabinetBusy = derived(cabinetState, ($s) =>
	$s.status === 'loading' || $s.status === 'mutating'
);

export const cabinetError = derived(cabinetState, ($s) =>
	$s.status === 'error' ? $s.message : null
);

export const filteredMedicines = derived(
	[cabinetMedicines, cabinetFilter, today, cabinetConfig],
	([$meds, $filter, $today, $config]) => filterMedicines($meds, $filter, $today, $config.soonWindowDays)
);

export const medicineCards = derived(
	[filteredMedicines, today, cabinetConfig],
	([$meds, $today, $config]) =>
		$meds.map((m) => medicineCardView(m, $today, $config.soonWindowDays, $config.lowStockThreshold))
);

export const filterCounts = derived(
	[cabinetMedicines, today, cabinetConfig],
	([$meds, $today, $config]) => countByFilter($meds, $today, $config.soonWindowDays)
);

export const cabinetSummary = derived(
	[cabinetMedicines, today, cabinetConfig],
	([$meds, $today, $config]) =>
		summarizeCabinet($meds, $today, $config.soonWindowDays, $config.lowStockThreshold)
);

/** Expired medicines whose blocking alert has not been acknowledged */
export const pendingExpiryAlerts = derived([cabinetMedicines, today], ([$meds, $today]) =>
	$meds.filter((m) => shouldShowBlockingModal(m, $today))
);

export const showExpiryBanner = derived([cabinetMedicines, today], ([$meds, $today]) =>
	shouldShowExpiryBanner($meds, $today)
);

/** Empty-state copy once loaded with nothing to show for the filter */
export const cabinetEmptyState = derived(
	[cabinetState, filteredMedicines, cabinetFilter],
	([$s, $meds, $filter]) => {
		if ($s.status === 'idle' || $s.status === 'loading') return null;
		return $meds.length === 0 ? emptyStateMessage($filter) : null;
	}
);

// === SESSION ===

/** Bind the cabinet to a user and inventory; restores the saved filter */
export async function openCabinet(options: OpenCabinetOptions): Promise<void> {
	const config = resolveCabinetConfig(options.config);
	const clock = options.clock ?? (() => new Date());
	session = { inventory: options.inventory, userId: options.userId, config, clock };

	cabinetConfig.set(config);
	today.set(toDateKey(clock()));
	cabinetState.set({ status: 'idle' });
	closeDoseSheet();
	cabinetFilter.set(await loadCabinetFilter());
}

/** Unbind and reset every cabinet store */
export function closeCabinet(): void {
	session = null;
	cabinetState.set({ status: 'idle' });
	cabinetFilter.set('all');
	cabinetConfig.set(resolveCabinetConfig());
	today.set(toDateKey(new Date()));
	closeDoseSheet();
}

export function isCabinetOpen(): boolean {
	return session !== null;
}

// === HELPERS ===

function medicinesOf(state: CabinetState): MedicineRecord[] {
	return state.status === 'idle' ? [] : state.medicines;
}

function rejected(reason: Exclude<CabinetActionResult, { ok: true }>['reason'], message: string): CabinetActionResult {
	return { ok: false, reason, message };
}

/** Session and idle-state guard shared by every action */
function acquire(): { active: CabinetSession } | { rejection: CabinetActionResult } {
	if (!session) return { rejection: rejected('not_open', 'Cabinet is not open') };
	const state = get(cabinetState);
	if (state.status === 'loading' || state.status === 'mutating') {
		return { rejection: rejected('busy', 'Another cabinet action is in progress') };
	}
	return { active: session };
}

function findMedicine(medicineId: string): MedicineRecord | null {
	return medicinesOf(get(cabinetState)).find((m) => m.id === medicineId) ?? null;
}

// === FETCH ===

async function fetchCabinet(active: CabinetSession): Promise<CabinetActionResult> {
	const now = active.clock();
	today.set(toDateKey(now));

	const previous = medicinesOf(get(cabinetState));
	const result = await active.inventory.fetchMedicines(active.userId);
	if (session !== active) return rejected('not_open', 'Cabinet was closed');

	if (result.ok) {
		cabinetState.set({ status: 'ready', medicines: result.data, loadedAt: now.toISOString() });
		await saveLastKnownCabinet(active.userId, result.data, now);
		return { ok: true };
	}

	let medicines = previous;
	if (medicines.length === 0) {
		const cached = await loadLastKnownCabinet(active.userId);
		if (cached) medicines = cached.medicines;
	}

	const message = describeFailure(result.failure);
	log.warn('Loading medicines failed', result.failure);
	cabinetState.set({ status: 'error', medicines, message });
	pushNotice('error', `Error loading medicines: ${message}`);
	return rejected('failed', message);
}

/** Load (or reload) the cabinet from the inventory */
export async function loadCabinet(): Promise<CabinetActionResult> {
	const guard = acquire();
	if ('rejection' in guard) return guard.rejection;

	cabinetState.set({ status: 'loading', medicines: medicinesOf(get(cabinetState)) });
	return fetchCabinet(guard.active);
}

// === MUTATIONS ===

/**
 * Run one mutation, then re-fetch.
 * On failure the previous state is restored untouched and an error notice is shown.
 */
async function mutate(
	action: CabinetAction,
	failurePrefix: string,
	run: (active: CabinetSession) => Promise<InventoryResult<void>>,
	onSuccess: () => void
): Promise<CabinetActionResult> {
	const guard = acquire();
	if ('rejection' in guard) return guard.rejection;
	const active = guard.active;

	const before = get(cabinetState);
	cabinetState.set({ status: 'mutating', medicines: medicinesOf(before), action });

	const result = await run(active);
	if (session !== active) return rejected('not_open', 'Cabinet was closed');

	if (!result.ok) {
		const message = describeFailure(result.failure);
		log.warn(`${action} failed`, result.failure);
		cabinetState.set(before);
		pushNotice('error', `${failurePrefix}: ${message}`);
		return rejected('failed', message);
	}

	onSuccess();
	cabinetState.set({ status: 'loading', medicines: medicinesOf(before) });
	await fetchCabinet(active);
	return { ok: true };
}

export function setFilter(filter: CabinetFilter): Promise<void> {
	cabinetFilter.set(filter);
	return saveCabinetFilter(filter);
}

/**
 * Open the take-dose sheet for a medicine.
 * Today's logs only mark slots as taken; if they cannot be read the sheet opens
 * with every slot available rather than blocking the dose.
 */
export async function openDoseSheet(medicineId: string): Promise<CabinetActionResult> {
	const guard = acquire();
	if ('rejection' in guard) return guard.rejection;
	const active = guard.active;

	const medicine = findMedicine(medicineId);
	if (!medicine) return rejected('not_found', `Medicine ${medicineId} is not in the cabinet`);

	// The day may have rolled over since the last fetch
	const now = active.clock();
	const todayKey = toDateKey(now);
	today.set(todayKey);

	if (shouldBlockDoseMarking(medicine, todayKey)) {
		return rejected('blocked', `${medicine.name} has expired and cannot be taken`);
	}

	const logs = await active.inventory.fetchTodayDoseLogs(active.userId, now);
	if (session !== active) return rejected('not_open', 'Cabinet was closed');

	if (!logs.ok) log.warn('Could not read today\'s dose logs; showing all slots', logs.failure);

	showDoseSheet(medicine, logs.ok ? logs.data : [], now, {
		logsUnavailable: !logs.ok,
		lowStockThreshold: active.config.lowStockThreshold,
		quantityChoices: active.config.doseQuantityOptions
	});
	return { ok: true };
}

/** Record the dose selected in the open sheet */
export async function confirmDose(): Promise<CabinetActionResult> {
	const sheet = get(doseSheet);
	if (sheet.phase !== 'open') return rejected('invalid', 'No dose sheet is open');
	if (!get(canConfirm)) return rejected('invalid', 'Dose selection cannot be confirmed');

	const { medicine, quantity, selectedSlot, lowStockThreshold } = sheet;

	return mutate(
		'take_dose',
		'Failed to log dose',
		(active) =>
			active.inventory.recordDose(active.userId, {
				medicineId: medicine.id,
				medicineName: medicine.name,
				quantity,
				scheduledTime: selectedSlot
			}),
		() => {
			const outcome = applyDose(medicine, quantity, lowStockThreshold);
			closeDoseSheet();
			pushNotice('success', `Took ${quantity} ${medicine.name}. ${outcome.tabletCount} remaining.`);
			if (outcome.lowStock) {
				pushNotice('warning', `Low stock! Only ${outcome.tabletCount} tablets left.`);
			}
		}
	);
}

/** Initial values for the new strip form */
export function stripFormDefaults(): StripFormDefaults {
	const config = session?.config ?? DEFAULT_CABINET_CONFIG;
	const now = session ? session.clock() : new Date();
	return {
		expiryDate: defaultStripExpiry(now, config.stripMonthsAhead),
		quantity: config.defaultStripQuantity,
		presets: [...config.stripQuantityPresets]
	};
}

/** Add a new strip: replace the expiry date and add tablets */
export async function restockMedicine(
	medicineId: string,
	newExpiry: string,
	addQuantity: number
): Promise<CabinetActionResult> {
	if (!isDateKey(newExpiry)) return rejected('invalid', `Invalid expiry date: ${newExpiry}`);
	if (!Number.isInteger(addQuantity) || addQuantity < 1) {
		return rejected('invalid', 'Quantity must be a positive whole number');
	}
	if (session && !findMedicine(medicineId)) {
		return rejected('not_found', `Medicine ${medicineId} is not in the cabinet`);
	}

	return mutate(
		'restock',
		'Failed to update',
		(active) => active.inventory.restock(active.userId, medicineId, newExpiry, addQuantity),
		() => pushNotice('success', 'Strip updated successfully!')
	);
}

export async function removeMedicine(medicineId: string): Promise<CabinetActionResult> {
	const medicine = session ? findMedicine(medicineId) : null;
	if (session && !medicine) return rejected('not_found', `Medicine ${medicineId} is not in the cabinet`);

	return mutate(
		'remove',
		'Failed to remove',
		(active) => active.inventory.removeMedicine(active.userId, medicineId),
		() => pushNotice('success', `${medicine?.name ?? 'Medicine'} removed from cabinet`)
	);
}

/** Dismiss an expired medicine's blocking alert so it is not shown again */
export async function acknowledgeExpiryAlert(medicineId: string): Promise<CabinetActionResult> {
	if (session && !findMedicine(medicineId)) {
		return rejected('not_found', `Medicine ${medicineId} is not in the cabinet`);
	}

	return mutate(
		'acknowledge_alert',
		'Failed to update alert status',
		(active) => active.inventory.markAlertShown(active.userId, medicineId),
		() => log.debug(`Expiry alert acknowledged for ${medicineId}`)
	);
}
