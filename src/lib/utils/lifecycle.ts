// App lifecycle: re-fetch the cabinet when the app returns or the network comes back
import { createLogger } from './logger.js';

const log = createLogger('lifecycle');

/** Removes a registered lifecycle callback */
export type Unsubscribe = () => void;

/** Lifecycle event listener interface (for native Capacitor App plugin) */
export interface LifecycleListener {
	onForeground(callback: () => void): Unsubscribe;
	onNetworkChange(callback: (connected: boolean) => void): Unsubscribe;
}

/** No-op lifecycle listener for non-native environments */
export class NoOpLifecycleListener implements LifecycleListener {
	onForeground(_callback: () => void): Unsubscribe {
		return () => { /* no-op */ };
	}
	onNetworkChange(_callback: (connected: boolean) => void): Unsubscribe {
		return () => { /* no-op */ };
	}
}

/** Result of a refresh attempt; only its completion matters here */
export type RefreshFn = () => Promise<{ ok: boolean }>;

/**
 * Re-fetch on foreground and on network regain.
 * Going offline does nothing: the screen keeps its last-known list.
 * Returns a function that removes both hooks.
 */
export function bindCabinetRefresh(listener: LifecycleListener, refresh: RefreshFn): Unsubscribe {
	const run = (reason: string) => {
		refresh()
			.then((result) => {
				if (!result.ok) log.debug(`Refresh on ${reason} did not complete`);
			})
			.catch((err: unknown) => log.error(`Refresh on ${reason} threw`, err));
	};

	const offForeground = listener.onForeground(() => run('foreground'));
	const offNetwork = listener.onNetworkChange((connected) => {
		if (connected) run('network regained');
	});

	return () => {
		offForeground();
		offNetwork();
	};
}
