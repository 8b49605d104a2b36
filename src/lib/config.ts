// Cabinet configuration: tunables and Firebase options from the environment
import type { FirebaseOptions } from 'firebase/app';
import type { CabinetConfig } from './types/cabinet.js';
import { DEFAULT_CABINET_CONFIG } from './types/cabinet.js';

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

/** Environment keys read by `loadFirebaseOptions` */
export const FIREBASE_ENV_KEYS = {
	apiKey: 'VITE_FIREBASE_API_KEY',
	authDomain: 'VITE_FIREBASE_AUTH_DOMAIN',
	projectId: 'VITE_FIREBASE_PROJECT_ID',
	storageBucket: 'VITE_FIREBASE_STORAGE_BUCKET',
	messagingSenderId: 'VITE_FIREBASE_MESSAGING_SENDER_ID',
	appId: 'VITE_FIREBASE_APP_ID'
} as const;

const REQUIRED_FIREBASE_KEYS = ['apiKey', 'projectId', 'appId'] as const;

export type EnvSource = Record<string, string | undefined>;

/** Build Firebase options; apiKey, projectId and appId are required */
export function loadFirebaseOptions(env: EnvSource): FirebaseOptions {
	const missing = REQUIRED_FIREBASE_KEYS
		.filter((key) => !env[FIREBASE_ENV_KEYS[key]]?.trim())
		.map((key) => FIREBASE_ENV_KEYS[key]);

	if (missing.length > 0) {
		throw new ConfigError(`Missing Firebase environment variables: ${missing.join(', ')}`);
	}

	const read = (field: keyof typeof FIREBASE_ENV_KEYS): string | undefined =>
		env[FIREBASE_ENV_KEYS[field]]?.trim() || undefined;

	return {
		apiKey: read('apiKey'),
		authDomain: read('authDomain'),
		projectId: read('projectId'),
		storageBucket: read('storageBucket'),
		messagingSenderId: read('messagingSenderId'),
		appId: read('appId')
	};
}

function requireNonNegativeInt(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new ConfigError(`${name} must be a non-negative integer (got ${value})`);
	}
}

function requirePositiveInts(name: string, values: number[]): void {
	if (values.length === 0 || values.some((v) => !Number.isInteger(v) || v < 1)) {
		throw new ConfigError(`${name} must be a non-empty list of positive integers`);
	}
}

/** Merge overrides onto the defaults and validate the result */
export function resolveCabinetConfig(overrides: Partial<CabinetConfig> = {}): CabinetConfig {
	const config: CabinetConfig = {
		...DEFAULT_CABINET_CONFIG,
		doseQuantityOptions: [...DEFAULT_CABINET_CONFIG.doseQuantityOptions],
		stripQuantityPresets: [...DEFAULT_CABINET_CONFIG.stripQuantityPresets],
		...overrides
	};

	requireNonNegativeInt('soonWindowDays', config.soonWindowDays);
	requireNonNegativeInt('lowStockThreshold', config.lowStockThreshold);
	requireNonNegativeInt('stripMonthsAhead', config.stripMonthsAhead);
	if (!Number.isInteger(config.todayLogScanLimit) || config.todayLogScanLimit < 1) {
		throw new ConfigError(`todayLogScanLimit must be a positive integer (got ${config.todayLogScanLimit})`);
	}
	if (!Number.isInteger(config.defaultStripQuantity) || config.defaultStripQuantity < 1) {
		throw new ConfigError(`defaultStripQuantity must be a positive integer (got ${config.defaultStripQuantity})`);
	}
	requirePositiveInts('doseQuantityOptions', config.doseQuantityOptions);
	requirePositiveInts('stripQuantityPresets', config.stripQuantityPresets);

	return config;
}
