import { parseTimestamp } from "../events/timestamp.js";

const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

const WEEKDAY_NAMES = [
  "Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday",
];

/** 1234567 -> "1.23M". Below a thousand the integer part is shown as-is. */
export function formatNumber(num: number): string {
  if (num >= 1_000_000_000) return `${(num / 1_000_000_000).toFixed(2)}B`;
  if (num >= 1_000_000) return `${(num / 1_000_000).toFixed(2)}M`;
  if (num >= 1_000) return `${(num / 1_000).toFixed(2)}K`;
  return String(Math.trunc(num));
}

export function formatInteger(num: number): string {
  return Math.trunc(num).toLocaleString("en-US");
}

export function formatCost(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export function formatPercent(fraction: number, digits = 1): string {
  return `${(fraction * 100).toFixed(digits)}%`;
}

export function formatHour(hour: number): string {
  if (hour === 0) return "12:00 AM";
  if (hour < 12) return `${hour}:00 AM`;
  if (hour === 12) return "12:00 PM";
  return `${hour - 12}:00 PM`;
}

export function weekdayName(weekday: number): string {
  return WEEKDAY_NAMES[weekday] ?? `Day ${weekday}`;
}

/** "2025-12-04" or a full timestamp -> "December 04, 2025". */
export function formatLongDate(value: string): string {
  const time = parseTimestamp(value);
  if (!time) return value;
  const month = MONTH_NAMES[Number(time.month.slice(5)) - 1] ?? time.month;
  return `${month} ${String(time.dayOfMonth).padStart(2, "0")}, ${time.year}`;
}

/** "2025-03" -> "March 2025". */
export function formatMonth(value: string): string {
  const [year, month] = value.split("-");
  const name = MONTH_NAMES[Number(month) - 1];
  return name && year ? `${name} ${year}` : value;
}

export function ordinal(day: number): string {
  const tens = day % 100;
  if (tens >= 11 && tens <= 13) return `${day}th`;
  switch (day % 10) {
    case 1: return `${day}st`;
    case 2: return `${day}nd`;
    case 3: return `${day}rd`;
    default: return `${day}th`;
  }
}

/** "claude-4-sonnet-thinking" -> "4 Sonnet Thinking". */
export function prettyModelName(model: string): string {
  const pretty = model
    .replace(/claude-/g, "")
    .split(/[-\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
  return pretty || model;
}
