// In-memory inventory store tests
import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryInventoryStore } from './memory-inventory.js';
import { describeFailure } from './inventory.js';
import type { DoseLogEntry, MedicineRecord } from '../types/cabinet.js';

const USER = 'user-1';
const NOW = new Date(2026, 2, 10, 9, 0);

function makeMed(overrides: Partial<MedicineRecord> = {}): MedicineRecord {
	return {
		id: 'med-1',
		drugId: 'drug-1',
		name: 'Ibuprofen',
		category: null,
		tabletCount: 4,
		expiryDate: '2026-03-01',
		expiryAlertShown: true,
		dosesPerDay: 2,
		scheduleTimes: ['08:00', '20:00'],
		foodWarnings: [],
		addedAt: '2026-02-01T10:00:00.000Z',
		updatedAt: null,
		...overrides
	};
}

function makeLog(id: string, takenAt: Date): DoseLogEntry {
	return {
		id,
		medicineId: 'med-1',
		medicineName: 'Ibuprofen',
		scheduledTime: '08:00',
		quantityTaken: 1,
		takenAt: takenAt.toISOString()
	};
}

let store: MemoryInventoryStore;

beforeEach(() => {
	store = new MemoryInventoryStore(() => NOW);
});

describe('MemoryInventoryStore — reads', () => {
	it('lists medicines newest first', async () => {
		store.seed(USER, [
			makeMed({ id: 'old', addedAt: '2026-01-01T00:00:00.000Z' }),
			makeMed({ id: 'new', addedAt: '2026-03-01T00:00:00.000Z' })
		]);
		const result = await store.fetchMedicines(USER);
		expect(result.ok && result.data.map((m) => m.id)).toEqual(['new', 'old']);
	});

	it('returns an empty list for unknown users', async () => {
		expect(await store.fetchMedicines('nobody')).toEqual({ ok: true, data: [] });
	});

	it('keeps only logs since local midnight', async () => {
		store.seed(USER, [makeMed()], [
			makeLog('today', new Date(2026, 2, 10, 0, 0)),
			makeLog('yesterday', new Date(2026, 2, 9, 23, 59))
		]);
		const result = await store.fetchTodayDoseLogs(USER, NOW);
		expect(result.ok && result.data.map((l) => l.id)).toEqual(['today']);
	});

	it('returns dose logs the caller can change without touching the store', async () => {
		store.seed(USER, [makeMed()], [makeLog('today', new Date(2026, 2, 10, 8, 5))]);
		const result = await store.fetchTodayDoseLogs(USER, NOW);
		if (!result.ok) throw new Error('expected logs');
		result.data[0].quantityTaken = 9;

		expect(store.getDoseLogs(USER).map((l) => l.quantityTaken)).toEqual([1]);
	});
});

describe('MemoryInventoryStore — writes', () => {
	it('records a dose and decrements stock', async () => {
		store.seed(USER, [makeMed()]);
		const result = await store.recordDose(USER, {
			medicineId: 'med-1',
			medicineName: 'Ibuprofen',
			quantity: 3,
			scheduledTime: '20:00'
		});

		expect(result.ok).toBe(true);
		expect(store.getMedicine(USER, 'med-1')?.tabletCount).toBe(1);
		expect(store.getDoseLogs(USER)).toEqual([
			{
				id: 'log-1',
				medicineId: 'med-1',
				medicineName: 'Ibuprofen',
				scheduledTime: '20:00',
				quantityTaken: 3,
				takenAt: NOW.toISOString()
			}
		]);
	});

	it('clamps stock at zero', async () => {
		store.seed(USER, [makeMed({ tabletCount: 2 })]);
		await store.recordDose(USER, { medicineId: 'med-1', medicineName: 'Ibuprofen', quantity: 3, scheduledTime: null });
		expect(store.getMedicine(USER, 'med-1')?.tabletCount).toBe(0);
	});

	it('refuses a dose when stock is empty', async () => {
		store.seed(USER, [makeMed({ tabletCount: 0 })]);
		const result = await store.recordDose(USER, {
			medicineId: 'med-1',
			medicineName: 'Ibuprofen',
			quantity: 1,
			scheduledTime: null
		});
		expect(result).toEqual({ ok: false, failure: { kind: 'out_of_stock', message: 'Stock is empty' } });
		expect(store.getDoseLogs(USER)).toHaveLength(0);
	});

	it('restocks and re-arms the expiry alert', async () => {
		store.seed(USER, [makeMed()]);
		await store.restock(USER, 'med-1', '2026-09-01', 10);
		expect(store.getMedicine(USER, 'med-1')).toMatchObject({
			expiryDate: '2026-09-01',
			tabletCount: 14,
			expiryAlertShown: false,
			updatedAt: NOW.toISOString()
		});
	});

	it('reports not found for unknown medicines', async () => {
		const result = await store.restock(USER, 'missing', '2026-09-01', 10);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.failure.kind).toBe('not_found');
	});

	it('removes and acknowledges', async () => {
		store.seed(USER, [makeMed({ expiryAlertShown: false }), makeMed({ id: 'med-2' })]);
		await store.markAlertShown(USER, 'med-1');
		await store.markAlertShown(USER, 'med-1');
		expect(store.getMedicine(USER, 'med-1')?.expiryAlertShown).toBe(true);

		await store.removeMedicine(USER, 'med-2');
		expect(store.getMedicine(USER, 'med-2')).toBeNull();
	});
});

describe('MemoryInventoryStore — scripted failures', () => {
	it('fails the scripted operation until cleared', async () => {
		store.seed(USER, [makeMed()]);
		store.failWith('fetchMedicines', 'network');

		const failed = await store.fetchMedicines(USER);
		expect(failed).toEqual({
			ok: false,
			failure: { kind: 'network', message: 'fetchMedicines failed (network)' }
		});

		store.clearFailure('fetchMedicines');
		expect((await store.fetchMedicines(USER)).ok).toBe(true);
		expect(store.calls).toEqual(['fetchMedicines', 'fetchMedicines']);
	});

	it('does not mutate on a scripted failure', async () => {
		store.seed(USER, [makeMed()]);
		store.failWith('restock', 'unauthorized');
		await store.restock(USER, 'med-1', '2026-09-01', 10);
		expect(store.getMedicine(USER, 'med-1')?.tabletCount).toBe(4);
	});
});

describe('describeFailure', () => {
	it('describes each kind', () => {
		expect(describeFailure({ kind: 'network', message: 'offline' })).toBe('Network error: offline');
		expect(describeFailure({ kind: 'unauthorized', message: 'x' })).toBe(
			'You are not signed in or lack access to this cabinet.'
		);
		expect(describeFailure({ kind: 'not_found', message: 'x' })).toBe(
			'Medicine not found. It may have been removed on another device.'
		);
		expect(describeFailure({ kind: 'out_of_stock', message: 'x' })).toBe('Cannot log dose: stock is empty.');
		expect(describeFailure({ kind: 'unknown', message: 'quota' })).toBe('quota');
	});
});
