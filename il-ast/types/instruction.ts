// IL 命令 AST の型定義

import type { Identifier, Operand, Register } from "./operand";

export type LoadOp = "LD";
export type StoreOp = "ST";
export type BinaryOp =
  | "AND"
  | "ANDN"
  | "OR"
  | "ORN"
  | "XOR"
  | "XORN"
  | "ADD"
  | "SUB"
  | "MUL"
  | "DIV"
  | "MOD";
export type SetResetOp = "S" | "R";
export type JumpOp = "JMP" | "JMPC" | "JMPNC";

export type Mnemonic = LoadOp | StoreOp | BinaryOp | SetResetOp | JumpOp | "NOT";

export type Instruction =
  | { op: LoadOp; operand: Operand; text: string }
  | { op: StoreOp; target: Register; text: string }
  | { op: BinaryOp; operand: Operand; text: string }
  | { op: "NOT"; text: string }
  | { op: SetResetOp; target: Register; text: string }
  | { op: JumpOp; label: Identifier; text: string };
