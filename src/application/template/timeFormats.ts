/**
 * Timestamp encodings for the `when*` fields.
 *
 * Every formatter takes the UTC offset in minutes east of Greenwich, defaulting
 * to the process's local offset for that instant. The date is shifted by the
 * offset and then read back through the getUTC* accessors, so the output never
 * depends on the machine's TZ once an offset is passed in.
 */
const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

export function localOffsetMinutes(date: Date): number {
  // getTimezoneOffset() is minutes *behind* UTC; `|| 0` folds -0 into 0.
  return -date.getTimezoneOffset() || 0;
}

function shift(date: Date, offsetMinutes: number): Date {
  return new Date(date.getTime() + offsetMinutes * 60_000);
}

function calendar(d: Date): string {
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

function clock(d: Date): string {
  return `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

/** `.12` for 120ms, empty for 0ms. */
function millis(d: Date): string {
  const ms = d.getUTCMilliseconds();
  return ms === 0 ? '' : `.${pad(ms, 3).replace(/0+$/, '')}`;
}

function zone(offsetMinutes: number, separator: string): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}${separator}${pad(abs % 60)}`;
}

function isoZone(offsetMinutes: number): string {
  return offsetMinutes === 0 ? 'Z' : zone(offsetMinutes, ':');
}

/** `Tue, 05 Mar 2024 09:07:03 +0000` */
export function formatRfc1123Z(date: Date, offsetMinutes = localOffsetMinutes(date)): string {
  const d = shift(date, offsetMinutes);
  return (
    `${WEEKDAYS[d.getUTCDay()]}, ${pad(d.getUTCDate())} ${MONTHS[d.getUTCMonth()]} ` +
    `${pad(d.getUTCFullYear(), 4)} ${clock(d)} ${zone(offsetMinutes, '')}`
  );
}

/** `2024-03-05T10:07:03+01:00`, or `...Z` at offset zero. */
export function formatRfc3339(date: Date, offsetMinutes = localOffsetMinutes(date)): string {
  const d = shift(date, offsetMinutes);
  return `${calendar(d)}T${clock(d)}${isoZone(offsetMinutes)}`;
}

/** `2024-03-05T10:07:03.12+01:00`; the fraction is left out on a whole second. */
export function formatRfc3339Millis(date: Date, offsetMinutes = localOffsetMinutes(date)): string {
  const d = shift(date, offsetMinutes);
  return `${calendar(d)}T${clock(d)}${millis(d)}${isoZone(offsetMinutes)}`;
}

/** `2024-03-05T09:07:03Z` */
export function formatUtcIso(date: Date): string {
  return formatRfc3339(date, 0);
}

/** `2024-03-05T09:07:03.12Z` */
export function formatUtcIsoMillis(date: Date): string {
  return formatRfc3339Millis(date, 0);
}

export function formatUnixSeconds(date: Date): string {
  return String(Math.floor(date.getTime() / 1000));
}
