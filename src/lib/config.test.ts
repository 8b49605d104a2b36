// Configuration tests
import { describe, it, expect } from 'vitest';
import { ConfigError, loadFirebaseOptions, resolveCabinetConfig } from './config.js';
import { DEFAULT_CABINET_CONFIG } from './types/cabinet.js';

const FULL_ENV = {
	VITE_FIREBASE_API_KEY: 'test-api-key',
	VITE_FIREBASE_AUTH_DOMAIN: 'cabinet-test.example.com',
	VITE_FIREBASE_PROJECT_ID: 'cabinet-test',
	VITE_FIREBASE_STORAGE_BUCKET: '',
	VITE_FIREBASE_MESSAGING_SENDER_ID: '1234',
	VITE_FIREBASE_APP_ID: ' 1:1234:web:abcd '
};

describe('config — loadFirebaseOptions', () => {
	it('reads and trims the environment', () => {
		expect(loadFirebaseOptions(FULL_ENV)).toEqual({
			apiKey: 'test-api-key',
			authDomain: 'cabinet-test.example.com',
			projectId: 'cabinet-test',
			storageBucket: undefined,
			messagingSenderId: '1234',
			appId: '1:1234:web:abcd'
		});
	});

	it('names every missing required variable', () => {
		expect(() => loadFirebaseOptions({ VITE_FIREBASE_PROJECT_ID: 'cabinet-test', VITE_FIREBASE_APP_ID: '  ' })).toThrow(
			'Missing Firebase environment variables: VITE_FIREBASE_API_KEY, VITE_FIREBASE_APP_ID'
		);
	});

	it('throws a ConfigError', () => {
		expect(() => loadFirebaseOptions({})).toThrow(ConfigError);
	});
});

describe('config — resolveCabinetConfig', () => {
	it('returns the defaults without overrides', () => {
		expect(resolveCabinetConfig()).toEqual(DEFAULT_CABINET_CONFIG);
	});

	it('does not share default arrays', () => {
		const config = resolveCabinetConfig();
		expect(config.doseQuantityOptions).not.toBe(DEFAULT_CABINET_CONFIG.doseQuantityOptions);
	});

	it('applies overrides', () => {
		const config = resolveCabinetConfig({ soonWindowDays: 3, lowStockThreshold: 2 });
		expect(config.soonWindowDays).toBe(3);
		expect(config.lowStockThreshold).toBe(2);
		expect(config.todayLogScanLimit).toBe(100);
	});

	it('rejects invalid values', () => {
		expect(() => resolveCabinetConfig({ soonWindowDays: -1 })).toThrow(
			'soonWindowDays must be a non-negative integer (got -1)'
		);
		expect(() => resolveCabinetConfig({ todayLogScanLimit: 0 })).toThrow(
			'todayLogScanLimit must be a positive integer (got 0)'
		);
		expect(() => resolveCabinetConfig({ doseQuantityOptions: [] })).toThrow(
			'doseQuantityOptions must be a non-empty list of positive integers'
		);
		expect(() => resolveCabinetConfig({ lowStockThreshold: 1.5 })).toThrow(ConfigError);
	});
});
