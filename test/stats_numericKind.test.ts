import { describe, it, expect } from "vitest";
import {
    NumericKinds,
    U32_MAX,
    U64_MAX,
    U128_MAX,
    F32_MAX,
} from "../src/stats/numericKind";

describe("stats/numericKind", () => {
    it("marks only the u-prefixed kinds as unsigned", () => {
        for (const [name, kind] of Object.entries(NumericKinds)) {
            expect(kind.name).toBe(name);
            expect(kind.signed).toBe(!name.startsWith("u"));
        }
    });

    it("widens bigints to floats", () => {
        expect(NumericKinds.u64.toFloat(U64_MAX)).toBe(2 ** 64);
        expect(NumericKinds.u128.toFloat(U128_MAX)).toBe(2 ** 128);
        expect(NumericKinds.i64.toFloat(-7n)).toBe(-7);
    });

    it("rounds f32 values to single precision", () => {
        expect(NumericKinds.f32.toFloat(0.1)).toBe(Math.fround(0.1));
        expect(NumericKinds.f32.toFloat(0.1)).not.toBe(0.1);
        expect(NumericKinds.f32.toFloat(F32_MAX)).toBe(F32_MAX);
        expect(NumericKinds.f64.toFloat(0.1)).toBe(0.1);
    });

    it("passes small integers through unchanged", () => {
        expect(NumericKinds.u32.toFloat(U32_MAX)).toBe(4294967295);
        expect(NumericKinds.i8.toFloat(-128)).toBe(-128);
    });
});
