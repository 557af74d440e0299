import { epochDay, type ZonedTime } from "./zoned.js";

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

function dayOfYear(t: ZonedTime): number {
  return epochDay(t) - epochDay({ year: t.year, month: 1, day: 1, key: "" }) + 1;
}

/**
 * strftime 子集：%Y %y %m %d %H %I %M %S %f %p %j %a %A %b %B %Z %%
 *
 * 未识别的指令原样保留。
 */
export function strftime(format: string, t: ZonedTime): string {
  return format.replace(/%(.)/g, (whole, directive: string) => {
    switch (directive) {
      case "Y":
        return pad(t.year, 4);
      case "y":
        return pad(t.year % 100);
      case "m":
        return pad(t.month);
      case "d":
        return pad(t.day);
      case "H":
        return pad(t.hour);
      case "I":
        return pad(t.hour % 12 === 0 ? 12 : t.hour % 12);
      case "M":
        return pad(t.minute);
      case "S":
        return pad(t.second);
      case "f":
        return pad(t.millisecond * 1000, 6);
      case "p":
        return t.hour < 12 ? "AM" : "PM";
      case "j":
        return pad(dayOfYear(t), 3);
      case "a":
        return WEEKDAYS[t.weekday].slice(0, 3);
      case "A":
        return WEEKDAYS[t.weekday];
      case "b":
        return MONTHS[t.month - 1].slice(0, 3);
      case "B":
        return MONTHS[t.month - 1];
      case "Z":
        return t.timeZone;
      case "%":
        return "%";
      default:
        return whole;
    }
  });
}

const DIRECTIVE_PATTERNS: Record<string, string> = {
  Y: "\\d{4}",
  y: "\\d{2}",
  m: "\\d{2}",
  d: "\\d{2}",
  H: "\\d{2}",
  I: "\\d{2}",
  M: "\\d{2}",
  S: "\\d{2}",
  f: "\\d{6}",
  p: "(?:AM|PM)",
  j: "\\d{3}",
  a: "[A-Za-z]{3}",
  A: "[A-Za-z]+",
  b: "[A-Za-z]{3}",
  B: "[A-Za-z]+",
  Z: ".+",
  "%": "%",
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** 把 strftime 格式转成匹配其输出的正则（用于识别历史日志文件） */
export function strftimePattern(format: string): RegExp {
  let source = "";
  let i = 0;
  while (i < format.length) {
    const ch = format[i];
    if (ch === "%" && i + 1 < format.length) {
      const directive = format[i + 1];
      source += DIRECTIVE_PATTERNS[directive] ?? escapeRegExp(`%${directive}`);
      i += 2;
    } else {
      source += escapeRegExp(ch);
      i += 1;
    }
  }
  return new RegExp(`^${source}$`);
}
