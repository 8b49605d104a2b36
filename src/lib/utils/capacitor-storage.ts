// CapacitorStorageProvider: wraps @capacitor/preferences (SharedPreferences / UserDefaults)
import { Preferences } from '@capacitor/preferences';
import type { StorageProvider } from './storage.js';

/** Capacitor implementation using @capacitor/preferences */
export class CapacitorStorageProvider implements StorageProvider {
	async get(key: string): Promise<string | null> {
		const result = await Preferences.get({ key });
		return result.value;
	}

	async set(key: string, value: string): Promise<void> {
		await Preferences.set({ key, value });
	}

	async remove(key: string): Promise<void> {
		await Preferences.remove({ key });
	}
}
