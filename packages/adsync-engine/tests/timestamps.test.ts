import { expect } from "chai";
import {
  addMicros,
  compareCursors,
  epochMillisToCursor,
  formatEpochMicros,
  isCanonicalTimestamp,
  maxCursor,
  parseTimestampMicros,
  toCanonicalDate,
  toCanonicalTimestamp,
} from "../src/model/timestamps";

describe("Timestamps", () => {
  describe("formatEpochMicros", () => {
    it("should format the epoch", () => {
      expect(formatEpochMicros(0)).to.equal("1970-01-01 00:00:00.000000");
    });

    it("should keep all six fractional digits", () => {
      expect(formatEpochMicros(1_700_000_000_123_456)).to.equal(
        "2023-11-14 22:13:20.123456",
      );
    });

    it("should format instants before the epoch", () => {
      expect(formatEpochMicros(-1)).to.equal("1969-12-31 23:59:59.999999");
    });

    it("should reject fractional microseconds", () => {
      expect(() => formatEpochMicros(1.5)).to.throw(RangeError);
    });
  });

  describe("toCanonicalTimestamp", () => {
    it("should convert offsets to UTC", () => {
      expect(toCanonicalTimestamp("2024-03-01 10:00:00+02")).to.equal(
        "2024-03-01 08:00:00.000000",
      );
      expect(toCanonicalTimestamp("2024-03-01T10:00:00-05:30")).to.equal(
        "2024-03-01 15:30:00.000000",
      );
    });

    it("should truncate fractions beyond microseconds", () => {
      expect(toCanonicalTimestamp("2024-03-01T10:00:00.1234567Z")).to.equal(
        "2024-03-01 10:00:00.123456",
      );
    });

    it("should read a bare date as midnight UTC", () => {
      expect(toCanonicalTimestamp("2024-03-01")).to.equal(
        "2024-03-01 00:00:00.000000",
      );
    });

    it("should read integers as microseconds since the epoch", () => {
      expect(toCanonicalTimestamp(1_709_287_200_000_000)).to.equal(
        "2024-03-01 10:00:00.000000",
      );
    });

    it("should accept Date values", () => {
      expect(
        toCanonicalTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678))),
      ).to.equal("2024-01-02 03:04:05.678000");
    });

    it("should return null for impossible or unparseable values", () => {
      expect(toCanonicalTimestamp("2024-02-30 00:00:00")).to.equal(null);
      expect(toCanonicalTimestamp("2024-03-01 24:00:00")).to.equal(null);
      expect(toCanonicalTimestamp("not a time")).to.equal(null);
      expect(toCanonicalTimestamp(true)).to.equal(null);
      expect(parseTimestampMicros("")).to.equal(null);
    });

    it("should return null for instants beyond microsecond precision", () => {
      expect(toCanonicalTimestamp(new Date(8.64e15))).to.equal(null);
      expect(toCanonicalTimestamp("9999-12-31 00:00:00")).to.equal(null);
      expect(toCanonicalTimestamp(2 ** 60)).to.equal(null);
    });

    it("should produce canonical strings", () => {
      const value = toCanonicalTimestamp("2024-03-01T10:00:00Z");
      expect(value).to.be.a("string");
      expect(isCanonicalTimestamp(value ?? "")).to.equal(true);
      expect(isCanonicalTimestamp("2024-03-01T10:00:00Z")).to.equal(false);
    });
  });

  describe("toCanonicalDate", () => {
    it("should read integers as days since the epoch", () => {
      expect(toCanonicalDate(19723)).to.equal("2024-01-01");
    });

    it("should take the UTC date of a timestamp", () => {
      expect(toCanonicalDate("2024-05-06 23:59:59-01:00")).to.equal("2024-05-07");
    });

    it("should return null for invalid dates", () => {
      expect(toCanonicalDate("2024-13-01")).to.equal(null);
    });

    it("should return null for day counts past year 9999", () => {
      expect(toCanonicalDate(1_000_000_000)).to.equal(null);
      expect(toCanonicalDate(-1_000_000_000)).to.equal(null);
      expect(toCanonicalDate(1.5)).to.equal(null);
    });
  });

  describe("epochMillisToCursor", () => {
    it("should format milliseconds", () => {
      expect(epochMillisToCursor(1_709_287_200_123)).to.equal(
        "2024-03-01 10:00:00.123000",
      );
    });

    it("should return null where microseconds lose integer precision", () => {
      expect(epochMillisToCursor(9_000_000_000_000_000)).to.equal(null);
    });
  });

  describe("cursor ordering", () => {
    it("should compare canonical strings chronologically", () => {
      expect(
        compareCursors("2024-03-01 10:00:00.000001", "2024-03-01 10:00:00.000000"),
      ).to.equal(1);
      expect(
        compareCursors("2023-12-31 23:59:59.999999", "2024-01-01 00:00:00.000000"),
      ).to.equal(-1);
      expect(
        compareCursors("2024-01-01 00:00:00.000000", "2024-01-01 00:00:00.000000"),
      ).to.equal(0);
    });

    it("should treat a missing cursor as the smallest", () => {
      expect(maxCursor(null, "2024-01-01 00:00:00.000000")).to.equal(
        "2024-01-01 00:00:00.000000",
      );
      expect(maxCursor("2024-01-01 00:00:00.000000", undefined)).to.equal(
        "2024-01-01 00:00:00.000000",
      );
      expect(maxCursor(null, null)).to.equal(null);
    });

    it("should pick the later cursor", () => {
      expect(
        maxCursor("2024-01-02 00:00:00.000000", "2024-01-01 00:00:00.000000"),
      ).to.equal("2024-01-02 00:00:00.000000");
    });

    it("should carry microseconds across a second boundary", () => {
      expect(addMicros("2024-01-01 00:00:00.999999", 1)).to.equal(
        "2024-01-01 00:00:01.000000",
      );
    });
  });
});
