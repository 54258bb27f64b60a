import { describe, it, expect } from "vitest";

import {
  addMinutes,
  getLocalTimeParts,
  localDateString,
  minutesBetween,
  startOfMinute,
} from "../../../src/utils/time.js";

describe("utils/time", () => {
  describe("getLocalTimeParts", () => {
    it("should convert to the wall clock of the time zone", () => {
      expect(
        getLocalTimeParts(new Date("2024-06-05T17:07:00Z"), "America/Los_Angeles")
      ).toEqual({
        year: 2024,
        month: 6,
        day: 5,
        hour: 10,
        minute: 7,
        weekday: 3,
      });
    });

    it("should report midnight as hour 0", () => {
      expect(
        getLocalTimeParts(new Date("2024-06-05T00:30:00Z"), "UTC").hour
      ).toBe(0);
    });
  });

  describe("localDateString", () => {
    it("should use the local calendar date", () => {
      expect(
        localDateString(new Date("2024-06-06T03:00:00Z"), "America/Los_Angeles")
      ).toBe("2024-06-05");
    });
  });

  describe("minute arithmetic", () => {
    it("should truncate seconds", () => {
      expect(startOfMinute(new Date("2024-06-05T17:07:42.123Z")).toISOString()).toBe(
        "2024-06-05T17:07:00.000Z"
      );
    });

    it("should add and measure minutes", () => {
      const start = new Date("2024-06-05T17:00:00Z");

      expect(addMinutes(start, 90).toISOString()).toBe("2024-06-05T18:30:00.000Z");
      expect(minutesBetween(start, new Date("2024-06-05T17:45:00Z"))).toBe(45);
    });
  });
});
