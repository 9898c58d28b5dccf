import { format } from 'date-fns';

/**
 * Compact local timestamp for artifact names, e.g. 20240102_030405
 */
export function formatTimestamp(date: Date = new Date()): string {
  return format(date, 'yyyyMMdd_HHmmss');
}
