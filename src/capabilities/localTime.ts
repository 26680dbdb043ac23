import { DateTime } from 'luxon';
import { Clock } from '../memory/memory_types';

/**
 * Formats the clock's current instant as `hh:mm AM/PM` in the given IANA zone, falling back to UTC
 * for zones luxon does not know.
 */
export function formatLocalTime(clock: Clock, timezone: string): string {
    let local = DateTime.fromMillis(clock(), { zone: timezone });
    if (!local.isValid) {
        local = DateTime.fromMillis(clock(), { zone: 'UTC' });
    }
    return local.setLocale('en-US').toFormat('hh:mm a');
}
