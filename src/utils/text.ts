export function truncate(value: string, max: number): string {
    return value.length <= max ? value : value.slice(0, max);
}

export function formatDisplayDate(date: Date | null): string {
    return date ? date.toUTCString() : '';
}
