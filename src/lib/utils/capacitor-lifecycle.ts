// CapacitorLifecycleListener: wraps @capacitor/app + @capacitor/network
import { App } from '@capacitor/app';
import { Network } from '@capacitor/network';
import type { PluginListenerHandle } from '@capacitor/core';
import type { LifecycleListener, Unsubscribe } from './lifecycle.js';
import { createLogger } from './logger.js';

const log = createLogger('lifecycle');

function reportListenerError(err: unknown): void {
	log.error('Could not register or remove native listener', err);
}

/** Keep the pending handle so the listener can be removed once registered */
function track(pending: Promise<PluginListenerHandle>): Unsubscribe {
	pending.catch(reportListenerError);
	return () => {
		pending.then((handle) => handle.remove()).catch(reportListenerError);
	};
}

/** Capacitor implementation using @capacitor/app and @capacitor/network */
export class CapacitorLifecycleListener implements LifecycleListener {
	onForeground(callback: () => void): Unsubscribe {
		return track(
			App.addListener('appStateChange', (state) => {
				if (state.isActive) {
					callback();
				}
			})
		);
	}

	onNetworkChange(callback: (connected: boolean) => void): Unsubscribe {
		return track(
			Network.addListener('networkStatusChange', (status) => {
				callback(status.connected);
			})
		);
	}
}
