import type { LabelTable, LabeledInstr, Program } from "../types/program";
import type { Operand } from "../types/operand";
import type { Instruction, Mnemonic } from "../types/instruction";
import { IlError } from "./errors";

export class ParseError extends IlError {
  constructor(message: string, detail?: unknown) {
    super(message, detail);
    this.name = "ParseError";
  }
}

export class UnknownInstructionError extends ParseError {
  readonly mnemonic: string;

  constructor(mnemonic: string, sourceLine: number) {
    super(`Unknown instruction '${mnemonic}'`, { sourceLine, mnemonic });
    this.name = "UnknownInstructionError";
    this.mnemonic = mnemonic;
  }
}

export class ArityError extends ParseError {
  readonly expected: number;
  readonly actual: number;

  constructor(
    mnemonic: Mnemonic,
    expected: number,
    actual: number,
    sourceLine: number,
  ) {
    super(
      `'${mnemonic}' takes ${expected} operand(s), got ${actual}`,
      { sourceLine, mnemonic, expected, actual },
    );
    this.name = "ArityError";
    this.expected = expected;
    this.actual = actual;
  }
}

// ニーモニック → オペランド数（閉じた命令セット）
export const MNEMONICS: Readonly<Record<Mnemonic, 0 | 1>> = {
  LD: 1,
  ST: 1,
  AND: 1,
  ANDN: 1,
  OR: 1,
  ORN: 1,
  XOR: 1,
  XORN: 1,
  ADD: 1,
  SUB: 1,
  MUL: 1,
  DIV: 1,
  MOD: 1,
  NOT: 0,
  S: 1,
  R: 1,
  JMP: 1,
  JMPC: 1,
  JMPNC: 1,
};

const WORD_MASK = 0xffffffffn;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const DECIMAL = /^[0-9]+$/;
const HEX = /^16#([0-9A-Fa-f]+)$/;

export function parse(code: string): Program {
  const labels: LabelTable = new Map();
  const instructions: LabeledInstr[] = [];
  let pendingLabel: string | undefined;

  const lines = code.split(/\r?\n/);

  for (let i = 0; i < lines.length; i += 1) {
    const rawLine = lines[i] ?? "";
    const sourceLine = i + 1; // 1-based

    const trimmed = stripLineComment(rawLine).trim();
    if (trimmed === "") continue;

    const { label, rest } = splitLabel(trimmed, sourceLine);
    if (label !== undefined) {
      if (labels.has(label)) {
        throw new ParseError(`Duplicate label '${label}'`, { sourceLine });
      }
      // ラベルは次の命令 PC に紐づける
      labels.set(label, instructions.length);
      pendingLabel = label;
      if (rest === "") continue;
    }

    const instr = parseLine(rest, sourceLine);
    instructions.push({
      label: pendingLabel,
      instr,
      sourceLine,
      pc: instructions.length,
    });
    pendingLabel = undefined;
  }

  return { instructions, labels };
}

export function parseLine(text: string, sourceLine = 1): Instruction {
  const trimmed = text.trim();
  if (trimmed === "") {
    throw new ParseError("Empty instruction", { sourceLine });
  }
  const [head, ...args] = trimmed.split(/\s+/);
  const mnemonic = head ?? "";
  if (!isMnemonic(mnemonic)) {
    throw new UnknownInstructionError(mnemonic, sourceLine);
  }
  const expected = MNEMONICS[mnemonic];
  if (args.length !== expected) {
    throw new ArityError(mnemonic, expected, args.length, sourceLine);
  }
  const arg = args[0] ?? "";

  switch (mnemonic) {
    case "NOT":
      return { op: mnemonic, text: trimmed };
    case "LD":
    case "AND":
    case "ANDN":
    case "OR":
    case "ORN":
    case "XOR":
    case "XORN":
    case "ADD":
    case "SUB":
    case "MUL":
    case "DIV":
    case "MOD":
      return { op: mnemonic, operand: parseOperand(arg), text: trimmed };
    case "ST":
    case "S":
    case "R":
      return {
        op: mnemonic,
        target: expectIdentifier(arg, "variable", sourceLine),
        text: trimmed,
      };
    case "JMP":
    case "JMPC":
    case "JMPNC":
      return {
        op: mnemonic,
        label: expectIdentifier(arg, "label", sourceLine),
        text: trimmed,
      };
  }
}

/**
 * オペランドトークンを分類する。
 * 10 進リテラルと 16# リテラルはここで 32 bit にマスク済みの値になる。
 */
export function parseOperand(token: string): Operand {
  if (DECIMAL.test(token)) {
    return { kind: "int", value: toWord(BigInt(token)), text: token };
  }
  const hex = HEX.exec(token);
  if (hex) {
    return { kind: "int", value: toWord(BigInt(`0x${hex[1]}`)), text: token };
  }
  if (IDENTIFIER.test(token)) {
    return { kind: "reg", name: token, text: token };
  }
  return { kind: "invalid", text: token };
}

// --- 内部実装 ---

function isMnemonic(token: string): token is Mnemonic {
  return Object.prototype.hasOwnProperty.call(MNEMONICS, token);
}

function toWord(value: bigint): number {
  return Number(value & WORD_MASK);
}

function stripLineComment(line: string): string {
  const commentIndex = line.indexOf("//");
  return commentIndex >= 0 ? line.slice(0, commentIndex) : line;
}

function splitLabel(
  line: string,
  sourceLine: number,
): { label?: string; rest: string } {
  const colon = line.indexOf(":");
  if (colon < 0) return { rest: line };

  const label = line.slice(0, colon).trim();
  if (!IDENTIFIER.test(label)) {
    throw new ParseError(`Invalid label '${label}'`, { sourceLine });
  }
  return { label, rest: line.slice(colon + 1).trim() };
}

function expectIdentifier(
  token: string,
  role: "variable" | "label",
  sourceLine: number,
): string {
  if (IDENTIFIER.test(token)) return token;
  throw new ParseError(`Invalid ${role} name '${token}'`, {
    sourceLine,
    token,
  });
}
