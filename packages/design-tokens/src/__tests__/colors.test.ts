import {
  formatColor,
  getContrastColor,
  isTranslucent,
  parseColor,
  toOpaque,
  withAlpha,
} from "../colors";

describe("color utilities", () => {
  describe("parseColor", () => {
    it("should parse hex colors", () => {
      expect(parseColor("#fff")).toEqual({ r: 255, g: 255, b: 255, a: 1 });
      expect(parseColor("#2563EB")).toEqual({ r: 37, g: 99, b: 235, a: 1 });
      expect(parseColor("#3b82f680")).toEqual({ r: 59, g: 130, b: 246, a: 0.502 });
    });

    it("should parse rgb and rgba", () => {
      expect(parseColor("rgb(1, 2, 3)")).toEqual({ r: 1, g: 2, b: 3, a: 1 });
      expect(parseColor("rgba(59, 130, 246, 0.1)")).toEqual({ r: 59, g: 130, b: 246, a: 0.1 });
    });

    it("should parse transparent", () => {
      expect(parseColor("transparent")).toEqual({ r: 0, g: 0, b: 0, a: 0 });
    });

    it("should reject unsupported or out of range values", () => {
      expect(parseColor("hsl(0, 0%, 0%)")).toBeNull();
      expect(parseColor("rgb(300, 0, 0)")).toBeNull();
      expect(parseColor("rgba(0, 0, 0, 2)")).toBeNull();
      expect(parseColor("#12345")).toBeNull();
      expect(parseColor("blue")).toBeNull();
    });

    it("should require a separator between channels", () => {
      expect(parseColor("rgb(123)")).toBeNull();
      expect(parseColor("rgb(255255255)")).toBeNull();
      expect(parseColor("rgb(12, 34)")).toBeNull();
      expect(parseColor("rgb(1 2 3)")).toEqual({ r: 1, g: 2, b: 3, a: 1 });
    });
  });

  describe("formatColor", () => {
    it("should format opaque colors as hex", () => {
      expect(formatColor({ r: 37, g: 99, b: 235, a: 1 })).toBe("#2563eb");
    });

    it("should format translucent colors as rgba", () => {
      expect(formatColor({ r: 37, g: 99, b: 235, a: 0.25 })).toBe("rgba(37, 99, 235, 0.25)");
    });
  });

  describe("withAlpha", () => {
    it("should apply alpha to a hex color", () => {
      expect(withAlpha("#2563eb", 0.5)).toBe("rgba(37, 99, 235, 0.5)");
    });

    it("should return unparseable input unchanged", () => {
      expect(withAlpha("blue", 0.5)).toBe("blue");
    });
  });

  describe("isTranslucent", () => {
    it("should detect alpha below one", () => {
      expect(isTranslucent("transparent")).toBe(true);
      expect(isTranslucent("rgba(0, 0, 0, 0.4)")).toBe(true);
      expect(isTranslucent("#000000")).toBe(false);
      expect(isTranslucent("blue")).toBe(false);
    });
  });

  describe("toOpaque", () => {
    it("should composite over the backdrop", () => {
      expect(toOpaque("rgba(59, 130, 246, 0.2)", "#ffffff")).toBe("#d8e6fd");
      expect(toOpaque("transparent", "#1c1c1e")).toBe("#1c1c1e");
    });

    it("should pass opaque colors through", () => {
      expect(toOpaque("#2563eb", "#ffffff")).toBe("#2563eb");
    });
  });

  describe("getContrastColor", () => {
    it("should pick white on dark backgrounds and black on light ones", () => {
      expect(getContrastColor("#2563eb")).toBe("white");
      expect(getContrastColor("#f1f5f9")).toBe("black");
    });
  });
});
