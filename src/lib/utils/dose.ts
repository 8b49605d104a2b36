// Dose logic: remaining slots for today, slot suggestion, stock after a dose
import type {
	DoseLogEntry,
	DoseOutcome,
	DoseQuantityOption,
	MedicineRecord
} from '../types/cabinet.js';
import { DEFAULT_CABINET_CONFIG, SLOT_GRACE_MINUTES } from '../types/cabinet.js';
import { isLowStock } from './expiry.js';
import { slotMinutes } from './calendar.js';

/**
 * Slot labels already logged today for one medicine.
 * `todaysLogs` is the whole day's log set; entries for other medicines are ignored.
 */
export function loggedSlotsToday(medicineId: string, todaysLogs: DoseLogEntry[]): string[] {
	const slots: string[] = [];
	for (const log of todaysLogs) {
		if (log.medicineId !== medicineId || log.scheduledTime === null) continue;
		if (!slots.includes(log.scheduledTime)) slots.push(log.scheduledTime);
	}
	return slots;
}

/** Scheduled slots with no log today, in schedule order */
export function availableDoseSlots(
	medicine: Pick<MedicineRecord, 'id' | 'scheduleTimes'>,
	todaysLogs: DoseLogEntry[]
): string[] {
	const logged = new Set(loggedSlotsToday(medicine.id, todaysLogs));
	return medicine.scheduleTimes.filter((slot) => !logged.has(slot));
}

/** Every scheduled slot already logged (false when the medicine has no schedule) */
export function allDosesLogged(
	medicine: Pick<MedicineRecord, 'scheduleTimes'>,
	loggedSlots: string[]
): boolean {
	if (medicine.scheduleTimes.length === 0) return false;
	return medicine.scheduleTimes.every((slot) => loggedSlots.includes(slot));
}

/**
 * Pick the slot to preselect in the dose sheet: the first unlogged slot that is
 * still upcoming (no more than 30 minutes past), else any unlogged slot, else null.
 */
export function suggestDoseSlot(scheduleTimes: string[], loggedSlots: string[], now: Date): string | null {
	const nowMinutes = now.getHours() * 60 + now.getMinutes();
	const unlogged = scheduleTimes.filter((slot) => !loggedSlots.includes(slot));

	for (const slot of unlogged) {
		const minutes = slotMinutes(slot);
		if (minutes !== null && minutes >= nowMinutes - SLOT_GRACE_MINUTES) return slot;
	}

	return unlogged[0] ?? null;
}

/**
 * Stock after taking `quantityTaken` tablets.
 * Callers keep the quantity within the current count; the result never goes below zero.
 */
export function applyDose(
	medicine: Pick<MedicineRecord, 'tabletCount'>,
	quantityTaken: number,
	threshold: number = DEFAULT_CABINET_CONFIG.lowStockThreshold
): DoseOutcome {
	const tabletCount = Math.max(0, medicine.tabletCount - quantityTaken);
	return { tabletCount, lowStock: isLowStock({ tabletCount }, threshold) };
}

/** Quantity buttons; quantities above the current stock are disabled */
export function doseQuantityOptions(
	medicine: Pick<MedicineRecord, 'tabletCount'>,
	options: number[] = DEFAULT_CABINET_CONFIG.doseQuantityOptions
): DoseQuantityOption[] {
	return options.map((quantity) => ({ quantity, disabled: quantity > medicine.tabletCount }));
}

export interface DoseSelection {
	quantity: number;
	scheduledTime: string | null;
	dietaryConfirmed: boolean;
}

/** Whether the dose sheet's confirm action is enabled */
export function canConfirmDose(
	medicine: Pick<MedicineRecord, 'tabletCount' | 'scheduleTimes' | 'foodWarnings'>,
	loggedSlots: string[],
	selection: DoseSelection
): boolean {
	if (medicine.tabletCount <= 0) return false;
	if (selection.quantity < 1 || selection.quantity > medicine.tabletCount) return false;
	if (allDosesLogged(medicine, loggedSlots)) return false;

	if (medicine.scheduleTimes.length > 0 && selection.scheduledTime !== null) {
		if (loggedSlots.includes(selection.scheduledTime)) return false;
	}

	if (medicine.foodWarnings.length > 0 && !selection.dietaryConfirmed) return false;
	return true;
}

export function confirmDoseLabel(
	medicine: Pick<MedicineRecord, 'tabletCount' | 'scheduleTimes'>,
	loggedSlots: string[]
): string {
	if (medicine.tabletCount <= 0) return 'Out of Stock';
	if (allDosesLogged(medicine, loggedSlots)) return 'All Doses Taken';
	return 'Confirm Dose';
}
