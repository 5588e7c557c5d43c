/**
 * Time zone helpers built on Intl.
 */

/** Wall-clock "YYYY-MM-DD HH:mm:ss" of an instant in the given zone */
export function formatInZone(date: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "00";
  return (
    `${part("year")}-${part("month")}-${part("day")} ` +
    `${part("hour")}:${part("minute")}:${part("second")}`
  );
}

/** Gateway request format: "YYYYMMDD HH:mm:ss Zone" */
export function gatewayDateTime(date: Date, timezone: string): string {
  return `${formatInZone(date, timezone).replace(/-/g, "")} ${timezone}`;
}

/** Whole days covered by a range, at least one */
export function spanInDays(start: Date, end: Date): number {
  const days = Math.ceil((end.getTime() - start.getTime()) / 86_400_000);
  return Math.max(days, 1);
}

/** True when the string names a zone Intl knows */
export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}
