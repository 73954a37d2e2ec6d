import { ZodError } from "zod";

import { createThemeContext } from "../context";
import { resolveStyle } from "../resolver";
import { parseStyleRequest, safeParseStyleRequest } from "../schemas";

describe("parseStyleRequest", () => {
  it("should accept a well-formed request", () => {
    const input = {
      presetId: "outline",
      size: "small",
      overrides: { cornerRadius: 4, borderColor: "rgba(0, 0, 0, 0.2)", font: "caption" },
    };

    expect(parseStyleRequest(input)).toEqual(input);
  });

  it("should accept unknown preset tags", () => {
    const request = parseStyleRequest({ presetId: "neon" });
    const context = createThemeContext();

    expect(resolveStyle(request, context)).toEqual(resolveStyle({ presetId: "default" }, context));
  });

  it("should reject invalid colors", () => {
    expect(() => parseStyleRequest({ presetId: "filled", overrides: { backgroundColor: "blue-ish" } })).toThrow(
      ZodError
    );
  });

  it("should reject unknown override fields", () => {
    const result = safeParseStyleRequest({ presetId: "filled", overrides: { opacity: 0.5 } });
    expect(result.success).toBe(false);
  });

  it("should reject negative dimensions and unknown sizes", () => {
    expect(safeParseStyleRequest({ presetId: "filled", overrides: { cornerRadius: -2 } }).success).toBe(false);
    expect(safeParseStyleRequest({ presetId: "filled", size: "huge" }).success).toBe(false);
  });

  it("should reject a missing or empty preset tag", () => {
    expect(safeParseStyleRequest({}).success).toBe(false);
    expect(safeParseStyleRequest({ presetId: "" }).success).toBe(false);
  });
});
