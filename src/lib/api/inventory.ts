// Inventory store contract: medicines, dose logs, restock, removal, alert acknowledgment
import type { DoseLogEntry, DoseRequest, MedicineRecord } from '../types/cabinet.js';

/** Why an inventory call did not complete */
export type InventoryFailureKind =
	| 'network'
	| 'unauthorized'
	| 'not_found'
	| 'out_of_stock'
	| 'unknown';

export interface InventoryFailure {
	kind: InventoryFailureKind;
	message: string;
}

/** Result of an inventory call; failures are values, never thrown */
export type InventoryResult<T> =
	| { ok: true; data: T }
	| { ok: false; failure: InventoryFailure };

/**
 * Backend for the cabinet screen.
 * Every operation may fail with a network or authorization failure; callers treat any
 * failure as "did not complete" and keep their current state.
 */
export interface InventoryStore {
	fetchMedicines(userId: string): Promise<InventoryResult<MedicineRecord[]>>;
	/** Dose logs taken since local midnight of `now` */
	fetchTodayDoseLogs(userId: string, now: Date): Promise<InventoryResult<DoseLogEntry[]>>;
	recordDose(userId: string, dose: DoseRequest): Promise<InventoryResult<void>>;
	restock(
		userId: string,
		medicineId: string,
		newExpiry: string,
		addQuantity: number
	): Promise<InventoryResult<void>>;
	removeMedicine(userId: string, medicineId: string): Promise<InventoryResult<void>>;
	/** Idempotent */
	markAlertShown(userId: string, medicineId: string): Promise<InventoryResult<void>>;
}

export function success<T>(data: T): InventoryResult<T> {
	return { ok: true, data };
}

export function done(): InventoryResult<void> {
	return { ok: true, data: undefined };
}

export function failure<T>(kind: InventoryFailureKind, message: string): InventoryResult<T> {
	return { ok: false, failure: { kind, message } };
}

/** Short user-facing description of a failure */
export function describeFailure(f: InventoryFailure): string {
	switch (f.kind) {
		case 'network':
			return `Network error: ${f.message}`;
		case 'unauthorized':
			return 'You are not signed in or lack access to this cabinet.';
		case 'not_found':
			return 'Medicine not found. It may have been removed on another device.';
		case 'out_of_stock':
			return 'Cannot log dose: stock is empty.';
		case 'unknown':
			return f.message;
	}
}
