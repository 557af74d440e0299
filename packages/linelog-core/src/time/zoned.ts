/**
 * 时区换算
 *
 * 把一个时间点拆成指定时区下的日历字段。轮转判断、时间戳、文件名都从这里取值。
 */

/** 某时区下的日历日期 */
export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  /** "YYYY-MM-DD"，用于比较是否跨天 */
  key: string;
}

/** 某时区下的完整时间字段 */
export interface ZonedTime extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  /** 0 = Sunday */
  weekday: number;
  timeZone: string;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatterCache.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatterCache.set(timeZone, fmt);
  }
  return fmt;
}

/** 系统本地时区名，取不到时回退 UTC */
export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone || "UTC";
}

/** 时区名是否能被 Intl 识别 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/** 把 "local" 解析为系统时区，其余原样返回 */
export function resolveTimeZone(timeZone: string): string {
  const tz = timeZone.trim();
  return tz === "" || tz === "local" ? systemTimeZone() : tz;
}

export function dateKey(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

export function zonedTime(now: Date, timeZone: string): ZonedTime {
  const parts = getFormatter(timeZone).formatToParts(now);
  const map: Record<string, string> = {};
  for (const part of parts) {
    if (part.type !== "literal") map[part.type] = part.value;
  }
  const year = Number(map.year);
  const month = Number(map.month);
  const day = Number(map.day);
  return {
    year,
    month,
    day,
    key: dateKey(year, month, day),
    hour: Number(map.hour),
    minute: Number(map.minute),
    second: Number(map.second),
    millisecond: now.getUTCMilliseconds(),
    weekday: new Date(Date.UTC(year, month - 1, day)).getUTCDay(),
    timeZone,
  };
}

export function calendarDate(now: Date, timeZone: string): CalendarDate {
  const { year, month, day, key } = zonedTime(now, timeZone);
  return { year, month, day, key };
}

/** 日期当天 00:00:00，用于按日期渲染文件名 */
export function startOfDay(date: CalendarDate, timeZone: string): ZonedTime {
  return {
    ...date,
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0,
    weekday: new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay(),
    timeZone,
  };
}

/** 自 1970-01-01 起的天数，日期加减都走这里 */
export function epochDay(date: CalendarDate): number {
  return Math.floor(Date.UTC(date.year, date.month - 1, date.day) / 86_400_000);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  const year = d.getUTCFullYear();
  const month = d.getUTCMonth() + 1;
  const day = d.getUTCDate();
  return { year, month, day, key: dateKey(year, month, day) };
}
