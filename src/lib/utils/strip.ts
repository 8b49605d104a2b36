// New strip (restock) form helpers
import { DEFAULT_CABINET_CONFIG, STRIP_QUANTITY_MAX, STRIP_QUANTITY_MIN } from '../types/cabinet.js';
import { firstOfMonthAhead, isDateKey } from './calendar.js';

/** Pre-filled expiry: first day of the month `monthsAhead` months from now */
export function defaultStripExpiry(now: Date, monthsAhead: number = DEFAULT_CABINET_CONFIG.stripMonthsAhead): string {
	return firstOfMonthAhead(now, monthsAhead);
}

/**
 * Quantity to add: the selected preset, or the custom entry when one was typed.
 * An unparsable custom entry falls back to the default quantity.
 */
export function resolveStripQuantity(
	preset: number,
	customInput: string | null,
	fallback: number = DEFAULT_CABINET_CONFIG.defaultStripQuantity
): number {
	if (customInput === null) return preset;
	const trimmed = customInput.trim();
	if (!/^\d+$/.test(trimmed)) return fallback;
	return Number.parseInt(trimmed, 10);
}

/** Stepper bounds for the custom quantity */
export function isValidStripQuantity(quantity: number): boolean {
	return Number.isInteger(quantity) && quantity >= STRIP_QUANTITY_MIN && quantity <= STRIP_QUANTITY_MAX;
}

/** Step the custom quantity, staying within bounds */
export function stepStripQuantity(current: number, delta: number): number {
	const next = current + delta;
	return isValidStripQuantity(next) ? next : current;
}

export function isValidStripExpiry(expiryDate: string): boolean {
	return isDateKey(expiryDate);
}
