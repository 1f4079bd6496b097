// src/stats/numericKind.ts

/**
 * Capabilities an accumulator needs from the kind of number it is fed:
 * whether the kind may hold negative values, and how to widen a value
 * to a 64-bit float.
 */
export interface NumericKind<T> {
    readonly name: string;
    readonly signed: boolean;
    toFloat(value: T): number;
}

export type NumberKind = NumericKind<number>;
export type BigIntKind = NumericKind<bigint>;

function numberKind(name: string, signed: boolean): NumberKind {
    return { name, signed, toFloat: (value) => value };
}

function bigintKind(name: string, signed: boolean): BigIntKind {
    return { name, signed, toFloat: (value) => Number(value) };
}

export const i8 = numberKind("i8", true);
export const i16 = numberKind("i16", true);
export const i32 = numberKind("i32", true);
export const i64 = bigintKind("i64", true);
export const i128 = bigintKind("i128", true);
export const isize = bigintKind("isize", true);

export const u8 = numberKind("u8", false);
export const u16 = numberKind("u16", false);
export const u32 = numberKind("u32", false);
export const u64 = bigintKind("u64", false);
export const u128 = bigintKind("u128", false);
export const usize = bigintKind("usize", false);

export const f32: NumberKind = {
    name: "f32",
    signed: true,
    toFloat: (value) => Math.fround(value),
};
export const f64 = numberKind("f64", true);

export const NumericKinds = {
    i8,
    i16,
    i32,
    i64,
    i128,
    isize,
    u8,
    u16,
    u32,
    u64,
    u128,
    usize,
    f32,
    f64,
} as const;

export type NumericKindName = keyof typeof NumericKinds;

export const U8_MAX = 0xff;
export const U16_MAX = 0xffff;
export const U32_MAX = 0xffffffff;
export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;
export const USIZE_MAX = U64_MAX;
export const F32_MAX = 3.4028234663852886e38;
export const F64_MAX = Number.MAX_VALUE;
