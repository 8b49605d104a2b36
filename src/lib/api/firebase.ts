// Firebase initialisation: one app, one Firestore instance
import { getApp, getApps, initializeApp, type FirebaseApp } from 'firebase/app';
import { getFirestore, type Firestore } from 'firebase/firestore';
import { loadFirebaseOptions, type EnvSource } from '../config.js';
import { FirestoreInventoryStore } from './firestore-inventory.js';

/** Reuse the default app when it already exists (hot reload, repeated init) */
export function initFirebaseApp(env: EnvSource): FirebaseApp {
	if (getApps().length > 0) return getApp();
	return initializeApp(loadFirebaseOptions(env));
}

export function initFirestore(env: EnvSource): Firestore {
	return getFirestore(initFirebaseApp(env));
}

export function createFirestoreInventory(env: EnvSource, todayLogScanLimit?: number): FirestoreInventoryStore {
	return new FirestoreInventoryStore(initFirestore(env), todayLogScanLimit);
}
