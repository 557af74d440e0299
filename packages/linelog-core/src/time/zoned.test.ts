import { describe, it, expect } from "vitest";
import { addDays, calendarDate, epochDay, isValidTimeZone, resolveTimeZone, systemTimeZone, zonedTime } from "./zoned.js";

describe("zonedTime", () => {
  it("should decompose an instant in UTC", () => {
    const t = zonedTime(new Date("2026-03-01T10:20:30.123Z"), "UTC");
    expect(t).toMatchObject({ year: 2026, month: 3, day: 1, hour: 10, minute: 20, second: 30, millisecond: 123, weekday: 0 });
    expect(t.key).toBe("2026-03-01");
  });

  it("should shift the calendar date west of UTC", () => {
    const t = zonedTime(new Date("2026-03-01T03:30:00Z"), "America/New_York");
    expect(t.key).toBe("2026-02-28");
    expect(t.hour).toBe(22);
    expect(t.minute).toBe(30);
  });

  it("should roll over at local midnight east of UTC", () => {
    expect(calendarDate(new Date("2026-03-01T14:59:59Z"), "Asia/Tokyo").key).toBe("2026-03-01");
    expect(calendarDate(new Date("2026-03-01T15:00:00Z"), "Asia/Tokyo").key).toBe("2026-03-02");
  });
});

describe("time zone helpers", () => {
  it("should validate zone names", () => {
    expect(isValidTimeZone("Europe/Berlin")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
  });

  it("should resolve local to the system zone", () => {
    expect(resolveTimeZone("local")).toBe(systemTimeZone());
    expect(resolveTimeZone(" UTC ")).toBe("UTC");
  });
});

describe("date arithmetic", () => {
  it("should cross month boundaries", () => {
    const d = addDays({ year: 2026, month: 3, day: 1, key: "2026-03-01" }, -7);
    expect(d.key).toBe("2026-02-22");
    expect(epochDay({ year: 2026, month: 3, day: 1, key: "" }) - epochDay(d)).toBe(7);
  });
});
