import { isEnvFlagEnabled, parseEnvCsv, parseEnvFloat, parseEnvInt } from "../envParsers";

describe("env parsers", () => {
    it("parses integers with a fallback for empty values", () => {
        expect(parseEnvInt("42", 7)).toBe(42);
        expect(parseEnvInt("", 7)).toBe(7);
        expect(parseEnvInt(undefined, 7)).toBe(7);
        expect(parseEnvInt("abc", 7)).toBeNaN();
    });

    it("parses floats with a fallback", () => {
        expect(parseEnvFloat("0.35", 0)).toBe(0.35);
        expect(parseEnvFloat(" ", 0.5)).toBe(0.5);
    });

    it("only treats 'true' as an enabled flag", () => {
        expect(isEnvFlagEnabled("true")).toBe(true);
        expect(isEnvFlagEnabled(" TRUE ")).toBe(true);
        expect(isEnvFlagEnabled("1")).toBe(false);
        expect(isEnvFlagEnabled(undefined)).toBe(false);
    });

    it("splits csv values and drops blanks", () => {
        expect(parseEnvCsv("shoegaze, dream pop,,")).toEqual(["shoegaze", "dream pop"]);
        expect(parseEnvCsv(undefined)).toBeUndefined();
    });
});
