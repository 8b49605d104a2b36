// Firestore inventory store: users/{uid}/medicines and users/{uid}/dose_logs
import { FirebaseError } from 'firebase/app';
import {
	Timestamp,
	collection,
	deleteDoc,
	doc,
	getDocs,
	increment,
	limit,
	orderBy,
	query,
	runTransaction,
	serverTimestamp,
	updateDoc,
	type DocumentData,
	type Firestore
} from 'firebase/firestore';
import type { DoseLogEntry, DoseRequest, MedicineRecord } from '../types/cabinet.js';
import { DEFAULT_CABINET_CONFIG } from '../types/cabinet.js';
import type { InventoryFailureKind, InventoryResult, InventoryStore } from './inventory.js';
import { done, failure, success } from './inventory.js';
import { parseDateKey, startOfLocalDay, toDateKey } from '../utils/calendar.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('inventory');

const NETWORK_CODES = new Set(['unavailable', 'deadline-exceeded', 'cancelled', 'resource-exhausted']);
const UNAUTHORIZED_CODES = new Set(['permission-denied', 'unauthenticated']);

/** Raised inside a transaction to abort it with a specific failure kind */
class InventoryAbort extends Error {
	constructor(readonly kind: InventoryFailureKind, message: string) {
		super(message);
		this.name = 'InventoryAbort';
	}
}

/** Map anything thrown by the SDK to a failure kind */
export function classifyFirestoreError(err: unknown): { kind: InventoryFailureKind; message: string } {
	if (err instanceof InventoryAbort) return { kind: err.kind, message: err.message };
	if (err instanceof FirebaseError) {
		if (NETWORK_CODES.has(err.code)) return { kind: 'network', message: err.message };
		if (UNAUTHORIZED_CODES.has(err.code)) return { kind: 'unauthorized', message: err.message };
		if (err.code === 'not-found') return { kind: 'not_found', message: err.message };
		return { kind: 'unknown', message: err.message };
	}
	return { kind: 'unknown', message: err instanceof Error ? err.message : String(err) };
}

// --- Document mapping ---

function readString(value: unknown, fallback = ''): string {
	return typeof value === 'string' ? value : fallback;
}

function readCount(value: unknown, fallback = 0): number {
	return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readStringList(value: unknown): string[] {
	return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function readDateKey(value: unknown): string | null {
	return value instanceof Timestamp ? toDateKey(value.toDate()) : null;
}

function readIso(value: unknown): string | null {
	return value instanceof Timestamp ? value.toDate().toISOString() : null;
}

/** Firestore medicine document → MedicineRecord */
export function mapMedicineDoc(id: string, data: DocumentData): MedicineRecord {
	const category: unknown = data.category;
	return {
		id,
		drugId: readString(data.drugId),
		name: readString(data.medicineName),
		category: typeof category === 'string' ? category : null,
		tabletCount: readCount(data.tabletCount),
		expiryDate: readDateKey(data.expiryDate),
		expiryAlertShown: data.expiryAlertShown === true,
		dosesPerDay: readCount(data.dosesPerDay, 1),
		scheduleTimes: readStringList(data.scheduleTimes),
		foodWarnings: readStringList(data.foodWarnings),
		addedAt: readIso(data.addedAt) ?? new Date(0).toISOString(),
		updatedAt: readIso(data.updatedAt)
	};
}

/** Firestore dose log document → DoseLogEntry; null while the server timestamp is pending */
export function mapDoseLogDoc(id: string, data: DocumentData): DoseLogEntry | null {
	const takenAt = readIso(data.takenAt);
	if (takenAt === null) return null;

	const scheduledTime: unknown = data.scheduledTime;
	return {
		id,
		medicineId: readString(data.medicineId),
		medicineName: readString(data.medicineName),
		scheduledTime: typeof scheduledTime === 'string' ? scheduledTime : null,
		quantityTaken: readCount(data.quantityTaken, 1),
		takenAt
	};
}

/** Calendar date → Timestamp at local midnight */
function dateKeyToTimestamp(key: string): Timestamp {
	const parts = parseDateKey(key);
	if (!parts) throw new InventoryAbort('unknown', `Invalid expiry date: ${key}`);
	return Timestamp.fromDate(new Date(parts.year, parts.month - 1, parts.day));
}

// --- Store ---

export class FirestoreInventoryStore implements InventoryStore {
	constructor(
		private db: Firestore,
		private todayLogScanLimit: number = DEFAULT_CABINET_CONFIG.todayLogScanLimit
	) {}

	private medicinesCollection(userId: string) {
		return collection(this.db, 'users', userId, 'medicines');
	}

	private doseLogsCollection(userId: string) {
		return collection(this.db, 'users', userId, 'dose_logs');
	}

	async fetchMedicines(userId: string): Promise<InventoryResult<MedicineRecord[]>> {
		try {
			const snapshot = await getDocs(
				query(this.medicinesCollection(userId), orderBy('addedAt', 'desc'))
			);
			return success(snapshot.docs.map((d) => mapMedicineDoc(d.id, d.data())));
		} catch (err) {
			return this.fail('fetchMedicines', err);
		}
	}

	/**
	 * Reads the most recent logs and keeps today's locally, so no composite index
	 * (medicineId + takenAt) is needed.
	 */
	async fetchTodayDoseLogs(userId: string, now: Date): Promise<InventoryResult<DoseLogEntry[]>> {
		try {
			const snapshot = await getDocs(
				query(
					this.doseLogsCollection(userId),
					orderBy('takenAt', 'desc'),
					limit(this.todayLogScanLimit)
				)
			);

			const startOfDay = startOfLocalDay(now).getTime();
			const logs: DoseLogEntry[] = [];
			for (const d of snapshot.docs) {
				const entry = mapDoseLogDoc(d.id, d.data());
				if (entry && new Date(entry.takenAt).getTime() >= startOfDay) logs.push(entry);
			}
			return success(logs);
		} catch (err) {
			return this.fail('fetchTodayDoseLogs', err);
		}
	}

	/** Appends the log and decrements stock in one transaction */
	async recordDose(userId: string, dose: DoseRequest): Promise<InventoryResult<void>> {
		try {
			const medicineRef = doc(this.db, 'users', userId, 'medicines', dose.medicineId);
			const logRef = doc(this.doseLogsCollection(userId));

			await runTransaction(this.db, async (tx) => {
				const snapshot = await tx.get(medicineRef);
				if (!snapshot.exists()) {
					throw new InventoryAbort('not_found', `Medicine ${dose.medicineId} does not exist`);
				}

				const currentCount = readCount(snapshot.data().tabletCount);
				if (currentCount <= 0) {
					throw new InventoryAbort('out_of_stock', 'Cannot log dose: Stock is empty');
				}

				tx.set(logRef, {
					medicineId: dose.medicineId,
					medicineName: dose.medicineName,
					takenAt: serverTimestamp(),
					scheduledTime: dose.scheduledTime,
					quantityTaken: dose.quantity
				});
				tx.update(medicineRef, {
					tabletCount: Math.max(0, currentCount - dose.quantity),
					updatedAt: serverTimestamp()
				});
			});
			return done();
		} catch (err) {
			return this.fail('recordDose', err);
		}
	}

	/** New strip: replace expiry, add tablets, re-arm the expiry alert */
	async restock(
		userId: string,
		medicineId: string,
		newExpiry: string,
		addQuantity: number
	): Promise<InventoryResult<void>> {
		try {
			await updateDoc(doc(this.db, 'users', userId, 'medicines', medicineId), {
				expiryDate: dateKeyToTimestamp(newExpiry),
				tabletCount: increment(addQuantity),
				expiryAlertShown: false,
				updatedAt: serverTimestamp()
			});
			return done();
		} catch (err) {
			return this.fail('restock', err);
		}
	}

	async removeMedicine(userId: string, medicineId: string): Promise<InventoryResult<void>> {
		try {
			await deleteDoc(doc(this.db, 'users', userId, 'medicines', medicineId));
			return done();
		} catch (err) {
			return this.fail('removeMedicine', err);
		}
	}

	async markAlertShown(userId: string, medicineId: string): Promise<InventoryResult<void>> {
		try {
			await updateDoc(doc(this.db, 'users', userId, 'medicines', medicineId), {
				expiryAlertShown: true,
				updatedAt: serverTimestamp()
			});
			return done();
		} catch (err) {
			return this.fail('markAlertShown', err);
		}
	}

	private fail<T>(operation: string, err: unknown): InventoryResult<T> {
		const { kind, message } = classifyFirestoreError(err);
		log.error(`${operation} failed (${kind})`, err);
		return failure(kind, message);
	}
}
