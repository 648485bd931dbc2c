import { format } from 'date-fns'

/**
 * Format a publication date for the update feed, in local time with the
 * numeric UTC offset (e.g. `Mon, 19 Oct 2026 10:54:00 +0200`).
 *
 * @param date - Publication date.
 * @returns RFC 2822 style date.
 */
export function formatFeedDate(date: Date): string {
  return format(date, 'EEE, dd MMM yyyy HH:mm:ss xx')
}
