/**
 * Format a millisecond duration as m:ss, or h:mm:ss from one hour up.
 * Negative durations format as zero.
 */
export function formatDuration(ms: number): string {
	const totalSeconds = Math.max(0, Math.ceil(ms / 1000));
	const hours = Math.floor(totalSeconds / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	const seconds = totalSeconds % 60;
	const ss = String(seconds).padStart(2, '0');

	if (hours > 0) {
		return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
	}
	return `${minutes}:${ss}`;
}
