import type { BinaryOp, Instruction, LabelTable } from "@/il-ast";
import { cloneState, type MachineState, toWord } from "../core/state";
import { getAcc, isTruthy, setAcc, setReg } from "../core/state-ops";
import { DivisionByZeroError, UndefinedLabelError } from "../errors";
import type { NormalizedOptions } from "../options";
import { evalOperand } from "./eval";

export type ExecContext = {
  labels: LabelTable;
  options: Pick<NormalizedOptions, "unknownExpression" | "logger">;
};

function assertNever(instr: never, pc: number): never {
  throw new Error(
    `unsupported instruction '${(instr as Instruction).op}' at pc=${pc}`,
  );
}

/**
 * 1 命令分の遷移。入力の state は変更せず次状態を返す。
 * pc の後置インクリメントは呼び出し側（Machine）が行う。
 */
export function applyInstruction(
  instr: Instruction,
  state: MachineState,
  ctx: ExecContext,
): MachineState {
  const next = cloneState(state);
  const acc = getAcc(state);

  const jumpTo = (label: string) => {
    const target = ctx.labels.get(label);
    if (target === undefined) throw new UndefinedLabelError(label, state.pc);
    // ループ側の +1 でちょうどラベル位置に着地させる
    next.pc = target - 1;
  };

  switch (instr.op) {
    case "LD":
      setAcc(next, evalOperand(state, instr.operand, ctx.options));
      break;
    case "ST":
      setReg(next, instr.target, acc);
      break;
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
    case "MOD": {
      const value = evalOperand(state, instr.operand, ctx.options);
      setAcc(next, applyBinary(instr.op, acc, value, state.pc));
      break;
    }
    case "NOT":
      setAcc(next, toWord(~acc));
      break;
    case "S":
      if (isTruthy(acc)) setReg(next, instr.target, true);
      break;
    case "R":
      if (isTruthy(acc)) setReg(next, instr.target, false);
      break;
    case "JMP":
      jumpTo(instr.label);
      break;
    case "JMPC":
      if (isTruthy(acc)) jumpTo(instr.label);
      break;
    case "JMPNC":
      if (!isTruthy(acc)) jumpTo(instr.label);
      break;
    default:
      assertNever(instr, state.pc);
  }

  return next;
}

export function applyBinary(
  op: BinaryOp,
  acc: number,
  value: number,
  pc: number,
): number {
  switch (op) {
    case "AND":
      return toWord(acc & value);
    case "ANDN":
      return toWord(acc & ~value);
    case "OR":
      return toWord(acc | value);
    case "ORN":
      return toWord(acc | ~value);
    case "XOR":
      return toWord(acc ^ value);
    case "XORN":
      return toWord(acc ^ ~value);
    case "ADD":
      return toWord(acc + value);
    case "SUB":
      return toWord(acc - value);
    case "MUL":
      // 下位 32 bit のみ必要なので imul で桁落ちを避ける
      return toWord(Math.imul(acc, value));
    case "DIV":
      if (value === 0) throw new DivisionByZeroError(pc);
      return toWord(Math.floor(acc / value));
    case "MOD":
      if (value === 0) throw new DivisionByZeroError(pc);
      return toWord(acc % value);
  }
}
