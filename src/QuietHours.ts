export interface QuietHoursWindow {
    start: string; // HH:MM, inclusive
    end: string; // HH:MM, inclusive of the whole minute
    timeZone: string;
}

function toMinutes(clockTime: string): number {
    const [hours, minutes] = clockTime.split(':').map((part) => Number.parseInt(part, 10));
    return hours * 60 + minutes;
}

export function localMinutes(date: Date, timeZone: string): number {
    const parts = new Intl.DateTimeFormat('en-GB', {
        timeZone,
        hour: '2-digit',
        minute: '2-digit',
        hourCycle: 'h23',
    }).formatToParts(date);
    const hour = Number(parts.find((part) => part.type === 'hour')?.value ?? 0);
    const minute = Number(parts.find((part) => part.type === 'minute')?.value ?? 0);
    return hour * 60 + minute;
}

// Windows where start > end wrap past midnight, e.g. 23:00-04:59
export function isQuietHours(date: Date, window: QuietHoursWindow): boolean {
    const now = localMinutes(date, window.timeZone);
    const start = toMinutes(window.start);
    const end = toMinutes(window.end);
    if (start <= end) {
        return now >= start && now <= end;
    }
    return now >= start || now <= end;
}
