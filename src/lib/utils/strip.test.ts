// New strip form tests
import { describe, it, expect } from 'vitest';
import {
	defaultStripExpiry,
	isValidStripExpiry,
	isValidStripQuantity,
	resolveStripQuantity,
	stepStripQuantity
} from './strip.js';

describe('strip — defaults', () => {
	it('pre-fills the first of the month six months ahead', () => {
		expect(defaultStripExpiry(new Date(2026, 2, 10))).toBe('2026-09-01');
		expect(defaultStripExpiry(new Date(2026, 7, 20))).toBe('2027-02-01');
	});

	it('honours a custom horizon', () => {
		expect(defaultStripExpiry(new Date(2026, 2, 10), 12)).toBe('2027-03-01');
	});
});

describe('strip — quantity', () => {
	it('uses the preset without a custom entry', () => {
		expect(resolveStripQuantity(15, null)).toBe(15);
	});

	it('uses a parsable custom entry', () => {
		expect(resolveStripQuantity(10, ' 24 ')).toBe(24);
	});

	it('falls back to 10 for unparsable input', () => {
		expect(resolveStripQuantity(15, 'abc')).toBe(10);
		expect(resolveStripQuantity(15, '')).toBe(10);
		expect(resolveStripQuantity(15, '2.5')).toBe(10);
		expect(resolveStripQuantity(15, '-4')).toBe(10);
	});

	it('bounds the stepper to 1..100', () => {
		expect(isValidStripQuantity(1)).toBe(true);
		expect(isValidStripQuantity(100)).toBe(true);
		expect(isValidStripQuantity(0)).toBe(false);
		expect(isValidStripQuantity(101)).toBe(false);
		expect(stepStripQuantity(1, -1)).toBe(1);
		expect(stepStripQuantity(100, 1)).toBe(100);
		expect(stepStripQuantity(10, 1)).toBe(11);
	});

	it('validates the expiry date', () => {
		expect(isValidStripExpiry('2026-09-01')).toBe(true);
		expect(isValidStripExpiry('2026-09-31')).toBe(false);
	});
});
