import { describe, expect, it } from "vitest";
import { WindowError } from "../src/errors.js";
import {
  assertWindow,
  formatDateInTimeZone,
  isValidTimeZone,
  isWithinWindow,
  resolveDateWindow,
  resolveDaysBackWindow,
  toIsoSeconds,
  windowFromDaysBack
} from "../src/window.js";

const NOW = new Date("2026-03-01T00:00:00Z");

function captureWindowError(run: () => unknown): WindowError {
  try {
    run();
  } catch (error: unknown) {
    if (error instanceof WindowError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a WindowError");
}

describe("resolveDateWindow", () => {
  it("anchors a UTC window to midnight and end of day", () => {
    const window = resolveDateWindow({ fromDate: "2026-01-26", toDate: "2026-02-02" }, { now: NOW });

    expect(window.from.toISOString()).toBe("2026-01-26T00:00:00.000Z");
    expect(window.to.toISOString()).toBe("2026-02-02T23:59:59.000Z");
    expect(window.timezone).toBe("UTC");
    expect(window.days).toBe(8);
  });

  it("converts local midnight in Los Angeles to UTC", () => {
    const window = resolveDateWindow(
      { fromDate: "2026-02-01", toDate: "2026-02-01", timezone: "America/Los_Angeles" },
      { now: NOW }
    );

    expect(window.from.toISOString()).toBe("2026-02-01T08:00:00.000Z");
    expect(window.to.toISOString()).toBe("2026-02-02T07:59:59.000Z");
    expect(window.fromDate).toBe("2026-02-01");
    expect(window.days).toBe(1);
  });

  it("follows daylight saving changes inside the day", () => {
    const window = resolveDateWindow(
      { fromDate: "2026-03-08", toDate: "2026-03-08", timezone: "America/New_York" },
      { now: new Date("2026-04-01T00:00:00Z") }
    );

    expect(window.from.toISOString()).toBe("2026-03-08T05:00:00.000Z");
    expect(window.to.toISOString()).toBe("2026-03-09T03:59:59.000Z");
  });

  it("starts after a daylight saving gap at local midnight", () => {
    const window = resolveDateWindow(
      { fromDate: "2026-09-06", toDate: "2026-09-06", timezone: "America/Santiago" },
      { now: new Date("2026-10-01T00:00:00Z") }
    );

    expect(window.from.toISOString()).toBe("2026-09-06T04:00:00.000Z");
    expect(window.to.toISOString()).toBe("2026-09-07T02:59:59.000Z");
  });

  it("clamps the end of today to now", () => {
    const now = new Date("2026-02-02T12:00:00Z");
    const window = resolveDateWindow({ fromDate: "2026-02-01", toDate: "2026-02-02" }, { now });

    expect(window.to.toISOString()).toBe("2026-02-02T12:00:00.000Z");
    expect(window.from.getTime()).toBeLessThanOrEqual(window.to.getTime());
  });

  it("rejects future dates", () => {
    const now = new Date("2026-02-02T12:00:00Z");
    const fromError = captureWindowError(() =>
      resolveDateWindow({ fromDate: "2026-02-03", toDate: "2026-02-04" }, { now })
    );
    const toError = captureWindowError(() =>
      resolveDateWindow({ fromDate: "2026-02-01", toDate: "2026-02-03" }, { now })
    );

    expect(fromError.code).toBe("FUTURE_DATE");
    expect(toError.code).toBe("FUTURE_DATE");
    expect(toError.message).toBe("to_date cannot be in the future");
  });

  it("rejects reversed ranges", () => {
    const error = captureWindowError(() =>
      resolveDateWindow({ fromDate: "2026-02-02", toDate: "2026-02-01" }, { now: NOW })
    );
    expect(error.code).toBe("INVALID_DATE_RANGE");
  });

  it("rejects malformed and impossible dates", () => {
    expect(
      captureWindowError(() => resolveDateWindow({ fromDate: "2026-2-01", toDate: "2026-02-02" }, { now: NOW }))
        .code
    ).toBe("INVALID_DATE_FORMAT");
    expect(
      captureWindowError(() => resolveDateWindow({ fromDate: "2026-02-01", toDate: "2026-02-30" }, { now: NOW }))
        .code
    ).toBe("INVALID_DATE_FORMAT");
  });

  it("rejects abbreviations and unknown zones", () => {
    const abbreviation = captureWindowError(() =>
      resolveDateWindow({ fromDate: "2026-02-01", toDate: "2026-02-02", timezone: "PST" }, { now: NOW })
    );
    const unknown = captureWindowError(() =>
      resolveDateWindow(
        { fromDate: "2026-02-01", toDate: "2026-02-02", timezone: "Invalid/Timezone" },
        { now: NOW }
      )
    );

    expect(abbreviation.code).toBe("INVALID_TIMEZONE");
    expect(unknown.code).toBe("INVALID_TIMEZONE");
    expect(unknown.message).toContain("IANA");
  });

  it("limits the distance between the dates", () => {
    const atLimit = resolveDateWindow({ fromDate: "2025-01-01", toDate: "2025-07-20" }, { now: NOW });
    expect(atLimit.days).toBe(201);

    const error = captureWindowError(() =>
      resolveDateWindow({ fromDate: "2025-01-01", toDate: "2025-07-21" }, { now: NOW })
    );
    expect(error.code).toBe("DATE_RANGE_TOO_LARGE");
    expect(error.message).toBe("Date range cannot exceed 200 days");
  });
});

describe("relative windows", () => {
  it("counts whole days back from now", () => {
    const window = windowFromDaysBack(7, NOW);
    expect(window.from.toISOString()).toBe("2026-02-22T00:00:00.000Z");
    expect(window.to.toISOString()).toBe("2026-03-01T00:00:00.000Z");
  });

  it("rejects non-positive day counts", () => {
    expect(captureWindowError(() => windowFromDaysBack(0, NOW)).code).toBe("INVALID_DATE_RANGE");
    expect(captureWindowError(() => windowFromDaysBack(1.5, NOW)).code).toBe("INVALID_DATE_RANGE");
  });

  it("labels relative windows with local dates", () => {
    const window = resolveDaysBackWindow(1, {
      now: new Date("2026-02-02T03:00:00Z"),
      timezone: "America/Los_Angeles"
    });
    expect(window.fromDate).toBe("2026-01-31");
    expect(window.toDate).toBe("2026-02-01");
    expect(window.days).toBe(1);
  });
});

describe("window helpers", () => {
  it("treats both bounds as inclusive", () => {
    const window = {
      from: new Date("2026-02-01T00:00:00Z"),
      to: new Date("2026-02-01T23:59:59Z")
    };

    expect(isWithinWindow("2026-02-01T00:00:00Z", window)).toBe(true);
    expect(isWithinWindow("2026-02-01T23:59:59Z", window)).toBe(true);
    expect(isWithinWindow("2026-02-02T00:00:00Z", window)).toBe(false);
    expect(isWithinWindow(null, window)).toBe(false);
    expect(isWithinWindow("not a date", window)).toBe(false);
  });

  it("fails fast on inverted windows", () => {
    const error = captureWindowError(() =>
      assertWindow({ from: new Date("2026-02-02T00:00:00Z"), to: new Date("2026-02-01T00:00:00Z") })
    );
    expect(error.code).toBe("INVALID_DATE_RANGE");
  });

  it("formats dates and instants", () => {
    expect(formatDateInTimeZone(new Date("2026-02-01T05:00:00Z"), "America/Los_Angeles")).toBe(
      "2026-01-31"
    );
    expect(toIsoSeconds(new Date("2026-02-01T08:00:00.123Z"))).toBe("2026-02-01T08:00:00Z");
  });

  it("accepts UTC and area/location names only", () => {
    expect(isValidTimeZone("UTC")).toBe(true);
    expect(isValidTimeZone("Europe/Berlin")).toBe(true);
    expect(isValidTimeZone("America/Argentina/Buenos_Aires")).toBe(true);
    expect(isValidTimeZone("EST")).toBe(false);
  });
});
