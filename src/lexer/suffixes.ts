import { IntegerKind } from "./tokens.js";

export const INTEGER_SUFFIXES: Map<string, IntegerKind> = new Map([
  ["i8", IntegerKind.I8],
  ["i16", IntegerKind.I16],
  ["i32", IntegerKind.I32],
  ["i64", IntegerKind.I64],
  ["isz", IntegerKind.Isz],
  ["u8", IntegerKind.U8],
  ["u16", IntegerKind.U16],
  ["u32", IntegerKind.U32],
  ["u64", IntegerKind.U64],
  ["usz", IntegerKind.Usz],
]);

export const MAX_U64 = 0xffff_ffff_ffff_ffffn;
