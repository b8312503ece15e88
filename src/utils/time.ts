const pad = (value: number) => String(value).padStart(2, '0');

/** Local wall-clock time as `YYYYMMDD_HHMMSS`. */
export function formatStorageTimestamp(date: Date): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${day}_${time}`;
}
