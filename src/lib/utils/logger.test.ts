// Logger tests
import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from './logger.js';

afterEach(() => {
	setLogLevel('silent');
});

describe('logger', () => {
	it('prefixes lines with the scope', () => {
		setLogLevel('info');
		const spy = vi.spyOn(console, 'info').mockImplementation(() => {});
		createLogger('cabinet').info('Loaded');
		expect(spy).toHaveBeenCalledWith('[cabinet]', 'Loaded');
	});

	it('appends data only when given', () => {
		setLogLevel('debug');
		const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
		createLogger('storage').warn('Save failed', { key: 'k' });
		expect(spy).toHaveBeenCalledWith('[storage]', 'Save failed', { key: 'k' });
	});

	it('drops lines below the active level', () => {
		setLogLevel('warn');
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});
		const log = createLogger('x');
		log.debug('hidden');
		log.error('shown');
		expect(debug).not.toHaveBeenCalled();
		expect(error).toHaveBeenCalledTimes(1);
		expect(getLogLevel()).toBe('warn');
	});

	it('silent mutes everything', () => {
		setLogLevel('silent');
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});
		createLogger('x').error('nope');
		expect(error).not.toHaveBeenCalled();
	});
});
