// Capacitor provider initialization: wires native providers and starts the cabinet
//
// Falls back to in-memory storage and a no-op lifecycle listener on web.
import { Capacitor } from '@capacitor/core';
import type { CabinetConfig } from '../types/cabinet.js';
import type { InventoryStore } from '../api/inventory.js';
import type { EnvSource } from '../config.js';
import { initStorage } from './storage.js';
import type { LifecycleListener, Unsubscribe } from './lifecycle.js';
import { bindCabinetRefresh } from './lifecycle.js';
import { closeCabinet, loadCabinet, openCabinet, type CabinetActionResult } from '../stores/cabinet.js';

/** Refresh hooks of the running cabinet, if any */
let unbindRefresh: Unsubscribe | null = null;

/** Whether the app is running on a native platform (iOS/Android) */
export function isNativePlatform(): boolean {
	return Capacitor.isNativePlatform();
}

/** Switch storage from in-memory to Capacitor Preferences on native platforms */
export async function initCapacitorProviders(): Promise<void> {
	if (!isNativePlatform()) return;

	const { CapacitorStorageProvider } = await import('./capacitor-storage.js');
	initStorage(new CapacitorStorageProvider());
}

/** Create the appropriate LifecycleListener for the current platform */
export async function createLifecycleListener(): Promise<LifecycleListener> {
	if (!isNativePlatform()) {
		const { NoOpLifecycleListener } = await import('./lifecycle.js');
		return new NoOpLifecycleListener();
	}
	const { CapacitorLifecycleListener } = await import('./capacitor-lifecycle.js');
	return new CapacitorLifecycleListener();
}

export interface StartCabinetOptions {
	userId: string;
	/** Firebase environment; ignored when `inventory` is given */
	env?: EnvSource;
	inventory?: InventoryStore;
	config?: Partial<CabinetConfig>;
}

/**
 * Start the cabinet screen: providers, inventory, first load, refresh hooks.
 * Hooks from an earlier start are removed first. Returns the result of the first load.
 */
export async function startCabinet(options: StartCabinetOptions): Promise<CabinetActionResult> {
	await initCapacitorProviders();

	const inventory = options.inventory ?? (await createDefaultInventory(options.env ?? {}, options.config));
	await openCabinet({ inventory, userId: options.userId, config: options.config });

	const listener = await createLifecycleListener();
	unbindRefresh?.();
	unbindRefresh = bindCabinetRefresh(listener, loadCabinet);

	return loadCabinet();
}

/** Remove the refresh hooks and close the cabinet */
export function stopCabinet(): void {
	unbindRefresh?.();
	unbindRefresh = null;
	closeCabinet();
}

async function createDefaultInventory(env: EnvSource, config?: Partial<CabinetConfig>): Promise<InventoryStore> {
	const { createFirestoreInventory } = await import('../api/firebase.js');
	return createFirestoreInventory(env, config?.todayLogScanLimit);
}
