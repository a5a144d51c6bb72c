import { nearestRapidLevel, planOverride } from "../../src/ts/overrides";
import { OverrideKind, RealtimeCommand } from "@grbl-node/types";

const {
  FEED_OVERRIDE_RESET,
  FEED_OVERRIDE_COARSE_PLUS,
  FEED_OVERRIDE_COARSE_MINUS,
  FEED_OVERRIDE_FINE_PLUS,
  SPINDLE_OVERRIDE_RESET,
  SPINDLE_OVERRIDE_FINE_MINUS,
  RAPID_OVERRIDE_LOW,
  RAPID_OVERRIDE_MEDIUM,
  RAPID_OVERRIDE_RESET,
} = RealtimeCommand;

describe("planOverride", () => {
  describe("feed and spindle", () => {
    it("should combine coarse and fine steps", () => {
      expect(planOverride(OverrideKind.FEED, 100, 125)).toEqual([
        FEED_OVERRIDE_COARSE_PLUS,
        FEED_OVERRIDE_COARSE_PLUS,
        FEED_OVERRIDE_FINE_PLUS,
        FEED_OVERRIDE_FINE_PLUS,
        FEED_OVERRIDE_FINE_PLUS,
        FEED_OVERRIDE_FINE_PLUS,
        FEED_OVERRIDE_FINE_PLUS,
      ]);
    });

    it("should reset when returning to 100%", () => {
      expect(planOverride(OverrideKind.FEED, 150, 100)).toEqual([
        FEED_OVERRIDE_RESET,
      ]);
    });

    it("should go through a reset when that takes fewer bytes", () => {
      expect(planOverride(OverrideKind.SPINDLE, 120, 93)).toEqual([
        SPINDLE_OVERRIDE_RESET,
        ...Array<RealtimeCommand>(7).fill(SPINDLE_OVERRIDE_FINE_MINUS),
      ]);
    });

    it("should prefer the direct path on a tie", () => {
      expect(planOverride(OverrideKind.FEED, 110, 100)).toEqual([
        FEED_OVERRIDE_COARSE_MINUS,
      ]);
    });

    it("should clamp targets to 10-200%", () => {
      expect(planOverride(OverrideKind.FEED, 100, 250)).toEqual(
        Array<RealtimeCommand>(10).fill(FEED_OVERRIDE_COARSE_PLUS)
      );
      expect(planOverride(OverrideKind.FEED, 100, 5)).toEqual(
        Array<RealtimeCommand>(9).fill(FEED_OVERRIDE_COARSE_MINUS)
      );
    });

    it("should do nothing when already at the target", () => {
      expect(planOverride(OverrideKind.FEED, 100, 100)).toEqual([]);
      expect(planOverride(OverrideKind.SPINDLE, 200, 240)).toEqual([]);
    });
  });

  describe("rapid", () => {
    it("should select the nearest level", () => {
      expect(planOverride(OverrideKind.RAPID, 100, 30)).toEqual([
        RAPID_OVERRIDE_LOW,
      ]);
      expect(planOverride(OverrideKind.RAPID, 100, 60)).toEqual([
        RAPID_OVERRIDE_MEDIUM,
      ]);
      expect(planOverride(OverrideKind.RAPID, 25, 100)).toEqual([
        RAPID_OVERRIDE_RESET,
      ]);
    });

    it("should do nothing when the level does not change", () => {
      expect(planOverride(OverrideKind.RAPID, 25, 20)).toEqual([]);
    });
  });
});

describe("planOverride input", () => {
  it("should reject percentages that are not finite", () => {
    expect(() => planOverride(OverrideKind.FEED, 100, Number.NaN)).toThrow(
      new RangeError(
        "Override percentages must be finite numbers, got 100 and NaN"
      )
    );
    expect(() =>
      planOverride(OverrideKind.SPINDLE, Number.POSITIVE_INFINITY, 100)
    ).toThrow(RangeError);
    expect(() => planOverride(OverrideKind.RAPID, 100, Number.NaN)).toThrow(
      RangeError
    );
  });
});

describe("nearestRapidLevel", () => {
  it("should snap to 25, 50 or 100", () => {
    expect(nearestRapidLevel(10)).toBe(25);
    expect(nearestRapidLevel(60)).toBe(50);
    expect(nearestRapidLevel(90)).toBe(100);
  });

  it("should keep the lower level when halfway", () => {
    expect(nearestRapidLevel(75)).toBe(50);
  });
});
