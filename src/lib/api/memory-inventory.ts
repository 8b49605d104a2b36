// In-memory inventory store (tests, offline demos)
import type { DoseLogEntry, DoseRequest, MedicineRecord } from '../types/cabinet.js';
import type { InventoryFailureKind, InventoryResult, InventoryStore } from './inventory.js';
import { done, failure, success } from './inventory.js';
import { startOfLocalDay } from '../utils/calendar.js';

export type InventoryOperation = keyof InventoryStore;

interface UserCabinet {
	medicines: Map<string, MedicineRecord>;
	doseLogs: DoseLogEntry[];
}

/** In-memory implementation with scripted failures */
export class MemoryInventoryStore implements InventoryStore {
	private cabinets = new Map<string, UserCabinet>();
	private scriptedFailures = new Map<InventoryOperation, InventoryFailureKind>();
	private logCounter = 0;

	/** Calls made, in order (for assertions) */
	readonly calls: InventoryOperation[] = [];

	constructor(private clock: () => Date = () => new Date()) {}

	/** Seed a user's medicines (replaces existing ones) */
	seed(userId: string, medicines: MedicineRecord[], doseLogs: DoseLogEntry[] = []): void {
		this.cabinets.set(userId, {
			medicines: new Map(medicines.map((m) => [m.id, { ...m }])),
			doseLogs: [...doseLogs]
		});
	}

	/** Make every call to `operation` fail until `clearFailure` */
	failWith(operation: InventoryOperation, kind: InventoryFailureKind): void {
		this.scriptedFailures.set(operation, kind);
	}

	clearFailure(operation: InventoryOperation): void {
		this.scriptedFailures.delete(operation);
	}

	getMedicine(userId: string, medicineId: string): MedicineRecord | null {
		return this.cabinet(userId).medicines.get(medicineId) ?? null;
	}

	getDoseLogs(userId: string): DoseLogEntry[] {
		return [...this.cabinet(userId).doseLogs];
	}

	async fetchMedicines(userId: string): Promise<InventoryResult<MedicineRecord[]>> {
		const scripted = this.begin<MedicineRecord[]>('fetchMedicines');
		if (scripted) return scripted;

		const list = [...this.cabinet(userId).medicines.values()]
			.sort((a, b) => b.addedAt.localeCompare(a.addedAt))
			.map((m) => ({ ...m }));
		return success(list);
	}

	async fetchTodayDoseLogs(userId: string, now: Date): Promise<InventoryResult<DoseLogEntry[]>> {
		const scripted = this.begin<DoseLogEntry[]>('fetchTodayDoseLogs');
		if (scripted) return scripted;

		const startOfDay = startOfLocalDay(now).getTime();
		const logs = this.cabinet(userId)
			.doseLogs.filter((log) => new Date(log.takenAt).getTime() >= startOfDay)
			.map((log) => ({ ...log }));
		return success(logs);
	}

	async recordDose(userId: string, dose: DoseRequest): Promise<InventoryResult<void>> {
		const scripted = this.begin<void>('recordDose');
		if (scripted) return scripted;

		const cabinet = this.cabinet(userId);
		const medicine = cabinet.medicines.get(dose.medicineId);
		if (!medicine) return failure('not_found', `No medicine ${dose.medicineId}`);
		if (medicine.tabletCount <= 0) return failure('out_of_stock', 'Stock is empty');

		const takenAt = this.clock().toISOString();
		cabinet.doseLogs.push({
			id: `log-${++this.logCounter}`,
			medicineId: dose.medicineId,
			medicineName: dose.medicineName,
			scheduledTime: dose.scheduledTime,
			quantityTaken: dose.quantity,
			takenAt
		});
		cabinet.medicines.set(medicine.id, {
			...medicine,
			tabletCount: Math.max(0, medicine.tabletCount - dose.quantity),
			updatedAt: takenAt
		});
		return done();
	}

	async restock(
		userId: string,
		medicineId: string,
		newExpiry: string,
		addQuantity: number
	): Promise<InventoryResult<void>> {
		const scripted = this.begin<void>('restock');
		if (scripted) return scripted;

		const cabinet = this.cabinet(userId);
		const medicine = cabinet.medicines.get(medicineId);
		if (!medicine) return failure('not_found', `No medicine ${medicineId}`);

		cabinet.medicines.set(medicineId, {
			...medicine,
			expiryDate: newExpiry,
			tabletCount: medicine.tabletCount + addQuantity,
			expiryAlertShown: false,
			updatedAt: this.clock().toISOString()
		});
		return done();
	}

	async removeMedicine(userId: string, medicineId: string): Promise<InventoryResult<void>> {
		const scripted = this.begin<void>('removeMedicine');
		if (scripted) return scripted;

		this.cabinet(userId).medicines.delete(medicineId);
		return done();
	}

	async markAlertShown(userId: string, medicineId: string): Promise<InventoryResult<void>> {
		const scripted = this.begin<void>('markAlertShown');
		if (scripted) return scripted;

		const cabinet = this.cabinet(userId);
		const medicine = cabinet.medicines.get(medicineId);
		if (!medicine) return failure('not_found', `No medicine ${medicineId}`);

		cabinet.medicines.set(medicineId, { ...medicine, expiryAlertShown: true });
		return done();
	}

	private begin<T>(operation: InventoryOperation): InventoryResult<T> | null {
		this.calls.push(operation);
		const kind = this.scriptedFailures.get(operation);
		return kind ? failure(kind, `${operation} failed (${kind})`) : null;
	}

	private cabinet(userId: string): UserCabinet {
		let cabinet = this.cabinets.get(userId);
		if (!cabinet) {
			cabinet = { medicines: new Map(), doseLogs: [] };
			this.cabinets.set(userId, cabinet);
		}
		return cabinet;
	}
}
