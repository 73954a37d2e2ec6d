import { createTransition, getAnimation, glowIntensity, pulseScale, shimmerPhase } from "../motion";

describe("motion", () => {
  describe("getAnimation", () => {
    it("should return the preset", () => {
      expect(getAnimation("fadeIn")).toEqual({ duration: "200ms", easing: "ease-out" });
    });

    it("should collapse to an instant linear animation with reduced motion", () => {
      expect(getAnimation("toastEnter", true)).toEqual({ duration: "0ms", easing: "linear" });
    });
  });

  describe("createTransition", () => {
    it("should build a transition for each property", () => {
      expect(createTransition(["opacity", "transform"], "fadeIn")).toBe(
        "opacity 200ms ease-out, transform 200ms ease-out"
      );
      expect(createTransition("opacity", "press", true)).toBe("opacity 0ms linear");
    });
  });

  describe("shimmerPhase", () => {
    it("should sweep linearly from -1 to 1 over one period", () => {
      expect(shimmerPhase(0)).toBe(-1);
      expect(shimmerPhase(375)).toBe(-0.5);
      expect(shimmerPhase(750)).toBe(0);
      expect(shimmerPhase(1125)).toBe(0.5);
    });

    it("should restart every period", () => {
      expect(shimmerPhase(1500)).toBe(-1);
      expect(shimmerPhase(2250)).toBe(0);
    });

    it("should honour a custom period", () => {
      expect(shimmerPhase(500, { periodMs: 1000 })).toBe(0);
    });

    it("should treat negative time as the start", () => {
      expect(shimmerPhase(-200)).toBe(-1);
    });

    it("should rest at -1 with reduced motion", () => {
      expect(shimmerPhase(750, { reduceMotion: true })).toBe(-1);
    });
  });

  describe("pulseScale", () => {
    it("should ease out and back once per period", () => {
      expect(pulseScale(0)).toBe(1);
      expect(pulseScale(750)).toBeCloseTo(1.3);
      expect(pulseScale(1500)).toBe(1);
    });

    it("should rest at the starting scale with reduced motion", () => {
      expect(pulseScale(750, { reduceMotion: true, from: 0.8 })).toBe(0.8);
    });
  });

  describe("glowIntensity", () => {
    it("should breathe between min and max", () => {
      expect(glowIntensity(0)).toBe(0);
      expect(glowIntensity(375)).toBeCloseTo(0.3);
      expect(glowIntensity(750)).toBeCloseTo(0.6);
      expect(glowIntensity(750, { min: 0.2, max: 1 })).toBeCloseTo(1);
    });

    it("should hold the minimum with reduced motion", () => {
      expect(glowIntensity(750, { reduceMotion: true, min: 0.1 })).toBe(0.1);
    });
  });
});
