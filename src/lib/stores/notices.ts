// Notice queue: short, non-blocking messages shown after loads and mutations
import { writable, derived } from 'svelte/store';

export type NoticeKind = 'success' | 'warning' | 'error';

export interface Notice {
	id: number;
	kind: NoticeKind;
	message: string;
}

/** Oldest notices are dropped past this length */
export const MAX_NOTICES = 5;

export const notices = writable<Notice[]>([]);

/** Notice currently on screen (oldest first) */
export const currentNotice = derived(notices, ($n) => $n[0] ?? null);

let noticeCounter = 0;

export function pushNotice(kind: NoticeKind, message: string): Notice {
	const notice: Notice = { id: ++noticeCounter, kind, message };
	notices.update(($n) => {
		const next = [...$n, notice];
		return next.length > MAX_NOTICES ? next.slice(next.length - MAX_NOTICES) : next;
	});
	return notice;
}

export function dismissNotice(id: number): void {
	notices.update(($n) => $n.filter((n) => n.id !== id));
}

/** Reset notices (for testing) */
export function clearNotices(): void {
	notices.set([]);
}
