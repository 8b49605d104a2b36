// Key/value storage for device-local cabinet state (last-known list, selected filter)
import type { CabinetFilter, MedicineRecord } from '../types/cabinet.js';
import { CABINET_FILTERS } from '../types/cabinet.js';
import { createLogger } from './logger.js';

const log = createLogger('storage');

/** Provider interface for native storage (mockable in tests) */
export interface StorageProvider {
	get(key: string): Promise<string | null>;
	set(key: string, value: string): Promise<void>;
	remove(key: string): Promise<void>;
}

/** Well-known storage keys; the cabinet key is suffixed with the user id */
export const STORAGE_KEYS = {
	LAST_CABINET: 'last_cabinet',
	CABINET_FILTER: 'cabinet_filter'
} as const;

/** In-memory implementation for testing */
export class MemoryStorage implements StorageProvider {
	private store = new Map<string, string>();

	async get(key: string): Promise<string | null> {
		return this.store.get(key) ?? null;
	}

	async set(key: string, value: string): Promise<void> {
		this.store.set(key, value);
	}

	async remove(key: string): Promise<void> {
		this.store.delete(key);
	}

	clear(): void {
		this.store.clear();
	}

	has(key: string): boolean {
		return this.store.has(key);
	}
}

/** Active storage provider (set during app initialization) */
let activeProvider: StorageProvider = new MemoryStorage();

export function initStorage(provider: StorageProvider): void {
	activeProvider = provider;
}

export function getStorage(): StorageProvider {
	return activeProvider;
}

interface CachedCabinet {
	savedAt: string;
	medicines: MedicineRecord[];
}

function cabinetKey(userId: string): string {
	return `${STORAGE_KEYS.LAST_CABINET}:${userId}`;
}

function isCachedCabinet(value: unknown): value is CachedCabinet {
	if (typeof value !== 'object' || value === null) return false;
	if (!('savedAt' in value) || !('medicines' in value)) return false;
	return typeof value.savedAt === 'string' && Array.isArray(value.medicines);
}

/** Persist the last successfully loaded cabinet */
export async function saveLastKnownCabinet(userId: string, medicines: MedicineRecord[], now: Date): Promise<void> {
	const payload: CachedCabinet = { savedAt: now.toISOString(), medicines };
	try {
		await activeProvider.set(cabinetKey(userId), JSON.stringify(payload));
	} catch (err) {
		log.warn('Could not persist last-known cabinet', err);
	}
}

/** Last-known cabinet, or null when absent or unreadable */
export async function loadLastKnownCabinet(userId: string): Promise<CachedCabinet | null> {
	try {
		const raw = await activeProvider.get(cabinetKey(userId));
		if (raw === null) return null;
		const parsed: unknown = JSON.parse(raw);
		if (!isCachedCabinet(parsed)) {
			log.warn('Discarding malformed last-known cabinet');
			return null;
		}
		return parsed;
	} catch (err) {
		log.warn('Could not read last-known cabinet', err);
		return null;
	}
}

export async function clearLastKnownCabinet(userId: string): Promise<void> {
	await activeProvider.remove(cabinetKey(userId));
}

export async function saveCabinetFilter(filter: CabinetFilter): Promise<void> {
	try {
		await activeProvider.set(STORAGE_KEYS.CABINET_FILTER, filter);
	} catch (err) {
		log.warn('Could not persist cabinet filter', err);
	}
}

export async function loadCabinetFilter(): Promise<CabinetFilter> {
	try {
		const raw = await activeProvider.get(STORAGE_KEYS.CABINET_FILTER);
		const match = CABINET_FILTERS.find((f) => f === raw);
		return match ?? 'all';
	} catch (err) {
		log.warn('Could not read cabinet filter', err);
		return 'all';
	}
}
