// Calendar-date helpers: local date keys (YYYY-MM-DD) and whole-day arithmetic

const MS_PER_DAY = 86_400_000;

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MONTH_ABBREVIATIONS = [
	'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
	'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'
] as const;

/** Local calendar date of `date` as YYYY-MM-DD */
export function toDateKey(date: Date): string {
	const y = date.getFullYear();
	const m = String(date.getMonth() + 1).padStart(2, '0');
	const d = String(date.getDate()).padStart(2, '0');
	return `${y}-${m}-${d}`;
}

export function isDateKey(value: string): boolean {
	return parseDateKey(value) !== null;
}

/** Split a date key into numeric parts, rejecting impossible dates like 2026-02-30 */
export function parseDateKey(key: string): { year: number; month: number; day: number } | null {
	const match = DATE_KEY_PATTERN.exec(key);
	if (!match) return null;

	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const probe = new Date(Date.UTC(year, month - 1, day));
	if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) return null;

	return { year, month, day };
}

/** Days since the Unix epoch for a date key (timezone independent) */
function dayNumber(key: string): number {
	const parts = parseDateKey(key);
	if (!parts) throw new RangeError(`Invalid calendar date: ${key}`);
	return Date.UTC(parts.year, parts.month - 1, parts.day) / MS_PER_DAY;
}

/** Whole days from `from` to `to` (negative when `to` is earlier) */
export function diffDays(from: string, to: string): number {
	return dayNumber(to) - dayNumber(from);
}

export function addDays(key: string, days: number): string {
	const date = new Date((dayNumber(key) + days) * MS_PER_DAY);
	const y = date.getUTCFullYear();
	const m = String(date.getUTCMonth() + 1).padStart(2, '0');
	const d = String(date.getUTCDate()).padStart(2, '0');
	return `${y}-${m}-${d}`;
}

/** Local midnight of the day containing `now` */
export function startOfLocalDay(now: Date): Date {
	return new Date(now.getFullYear(), now.getMonth(), now.getDate());
}

/** First day of the month `months` after the month containing `now` */
export function firstOfMonthAhead(now: Date, months: number): string {
	return toDateKey(new Date(now.getFullYear(), now.getMonth() + months, 1));
}

/** "Jan 2027" style label */
export function formatMonthYear(key: string): string {
	const parts = parseDateKey(key);
	if (!parts) return key;
	return `${MONTH_ABBREVIATIONS[parts.month - 1]} ${parts.year}`;
}

/** Minutes after midnight for an "HH:mm" slot label; null when unparsable */
export function slotMinutes(label: string): number | null {
	const parts = label.split(':');
	if (parts.length !== 2) return null;
	const hour = Number.parseInt(parts[0], 10);
	const minute = Number.parseInt(parts[1], 10);
	if (Number.isNaN(hour) || Number.isNaN(minute)) return null;
	return hour * 60 + minute;
}

/** "8:00 AM" style label for an "HH:mm" slot */
export function formatSlotLabel(label: string): string {
	const minutes = slotMinutes(label);
	if (minutes === null) return label;
	const hour = Math.floor(minutes / 60);
	const minute = String(minutes % 60).padStart(2, '0');
	const period = hour >= 12 ? 'PM' : 'AM';
	const displayHour = hour > 12 ? hour - 12 : hour === 0 ? 12 : hour;
	return `${displayHour}:${minute} ${period}`;
}
