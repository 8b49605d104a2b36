// Lifecycle refresh tests
import { describe, it, expect, vi } from 'vitest';
import { NoOpLifecycleListener, bindCabinetRefresh, type LifecycleListener, type Unsubscribe } from './lifecycle.js';

function register<T>(list: T[], callback: T): Unsubscribe {
	list.push(callback);
	return () => {
		const index = list.indexOf(callback);
		if (index >= 0) list.splice(index, 1);
	};
}

class MockLifecycleListener implements LifecycleListener {
	foreground: Array<() => void> = [];
	network: Array<(connected: boolean) => void> = [];

	onForeground(callback: () => void): Unsubscribe {
		return register(this.foreground, callback);
	}
	onNetworkChange(callback: (connected: boolean) => void): Unsubscribe {
		return register(this.network, callback);
	}

	fireForeground(): void {
		for (const cb of this.foreground) cb();
	}
	fireNetwork(connected: boolean): void {
		for (const cb of this.network) cb(connected);
	}
}

describe('lifecycle — bindCabinetRefresh', () => {
	it('refreshes on foreground', () => {
		const listener = new MockLifecycleListener();
		const refresh = vi.fn().mockResolvedValue({ ok: true });
		bindCabinetRefresh(listener, refresh);

		listener.fireForeground();
		expect(refresh).toHaveBeenCalledTimes(1);
	});

	it('refreshes when the network comes back, not when it drops', () => {
		const listener = new MockLifecycleListener();
		const refresh = vi.fn().mockResolvedValue({ ok: true });
		bindCabinetRefresh(listener, refresh);

		listener.fireNetwork(false);
		expect(refresh).not.toHaveBeenCalled();
		listener.fireNetwork(true);
		expect(refresh).toHaveBeenCalledTimes(1);
	});

	it('stops refreshing once unbound', () => {
		const listener = new MockLifecycleListener();
		const refresh = vi.fn().mockResolvedValue({ ok: true });
		const unbind = bindCabinetRefresh(listener, refresh);
		expect(listener.foreground).toHaveLength(1);
		expect(listener.network).toHaveLength(1);

		unbind();
		expect(listener.foreground).toHaveLength(0);
		expect(listener.network).toHaveLength(0);
		listener.fireForeground();
		listener.fireNetwork(true);
		expect(refresh).not.toHaveBeenCalled();
	});

	it('logs a rejected refresh instead of propagating it', async () => {
		const listener = new MockLifecycleListener();
		const refresh = vi.fn().mockRejectedValue(new Error('boom'));
		bindCabinetRefresh(listener, refresh);

		listener.fireForeground();
		await vi.waitFor(() => expect(refresh).toHaveBeenCalledTimes(1));
	});

	it('NoOpLifecycleListener never calls back', () => {
		const refresh = vi.fn().mockResolvedValue({ ok: true });
		bindCabinetRefresh(new NoOpLifecycleListener(), refresh);
		expect(refresh).not.toHaveBeenCalled();
	});
});
