// Take-dose sheet state: slot and quantity selection, dietary confirmation
import { writable, derived, get } from 'svelte/store';
import type { DoseLogEntry, DoseQuantityOption, MedicineRecord } from '../types/cabinet.js';
import { DEFAULT_CABINET_CONFIG } from '../types/cabinet.js';
import {
	allDosesLogged,
	applyDose,
	availableDoseSlots,
	canConfirmDose,
	confirmDoseLabel,
	doseQuantityOptions,
	loggedSlotsToday,
	suggestDoseSlot
} from '../utils/dose.js';

export type DoseSheetState =
	| { phase: 'closed' }
	| {
		phase: 'open';
		medicine: MedicineRecord;
		loggedSlots: string[];
		availableSlots: string[];
		selectedSlot: string | null;
		quantity: number;
		dietaryConfirmed: boolean;
		/** Today's logs could not be read; no slot is marked as taken */
		logsUnavailable: boolean;
		lowStockThreshold: number;
		quantityChoices: number[];
	};

export interface ShowDoseSheetOptions {
	logsUnavailable?: boolean;
	lowStockThreshold?: number;
	quantityChoices?: number[];
}

export const doseSheet = writable<DoseSheetState>({ phase: 'closed' });

// --- Derived stores ---

export const isDoseSheetOpen = derived(doseSheet, ($s) => $s.phase === 'open');

export const doseQuantityChoices = derived(doseSheet, ($s): DoseQuantityOption[] =>
	$s.phase === 'open' ? doseQuantityOptions($s.medicine, $s.quantityChoices) : []
);

/** Tablets left if the selected quantity is taken */
export const remainingAfterDose = derived(doseSheet, ($s) =>
	$s.phase === 'open' ? applyDose($s.medicine, $s.quantity, $s.lowStockThreshold).tabletCount : null
);

/** Remaining-stock warning shown in the sheet (zero counts as low here) */
export const lowStockAfterDose = derived(doseSheet, ($s) => {
	if ($s.phase !== 'open') return false;
	return applyDose($s.medicine, $s.quantity, $s.lowStockThreshold).tabletCount <= $s.lowStockThreshold;
});

export const allDosesTakenToday = derived(doseSheet, ($s) =>
	$s.phase === 'open' ? allDosesLogged($s.medicine, $s.loggedSlots) : false
);

export const canConfirm = derived(doseSheet, ($s) =>
	$s.phase === 'open'
		? canConfirmDose($s.medicine, $s.loggedSlots, {
			quantity: $s.quantity,
			scheduledTime: $s.selectedSlot,
			dietaryConfirmed: $s.dietaryConfirmed
		})
		: false
);

export const confirmLabel = derived(doseSheet, ($s) =>
	$s.phase === 'open' ? confirmDoseLabel($s.medicine, $s.loggedSlots) : ''
);

// --- Transitions ---

/** Open the sheet for `medicine` given the day's dose logs */
export function showDoseSheet(
	medicine: MedicineRecord,
	todaysLogs: DoseLogEntry[],
	now: Date,
	options: ShowDoseSheetOptions = {}
): void {
	const loggedSlots = loggedSlotsToday(medicine.id, todaysLogs);
	doseSheet.set({
		phase: 'open',
		medicine,
		loggedSlots,
		availableSlots: availableDoseSlots(medicine, todaysLogs),
		selectedSlot: suggestDoseSlot(medicine.scheduleTimes, loggedSlots, now),
		quantity: 1,
		dietaryConfirmed: false,
		logsUnavailable: options.logsUnavailable ?? false,
		lowStockThreshold: options.lowStockThreshold ?? DEFAULT_CABINET_CONFIG.lowStockThreshold,
		quantityChoices: options.quantityChoices ?? DEFAULT_CABINET_CONFIG.doseQuantityOptions
	});
}

/** Select a slot; already-logged or unknown slots are refused */
export function selectDoseSlot(slot: string): boolean {
	const state = get(doseSheet);
	if (state.phase !== 'open') return false;
	if (!state.availableSlots.includes(slot)) return false;

	doseSheet.set({ ...state, selectedSlot: slot });
	return true;
}

/** Select a quantity; quantities above the current stock are refused */
export function selectDoseQuantity(quantity: number): boolean {
	const state = get(doseSheet);
	if (state.phase !== 'open') return false;
	if (!Number.isInteger(quantity) || quantity < 1 || quantity > state.medicine.tabletCount) return false;

	doseSheet.set({ ...state, quantity });
	return true;
}

export function setDietaryConfirmed(confirmed: boolean): void {
	doseSheet.update(($s) => ($s.phase === 'open' ? { ...$s, dietaryConfirmed: confirmed } : $s));
}

export function closeDoseSheet(): void {
	doseSheet.set({ phase: 'closed' });
}
