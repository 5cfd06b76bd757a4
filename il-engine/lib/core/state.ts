import type { RegisterValue } from "@/lib/run-schema";

export type { RegisterValue };

export const ACC = "ACC";

export type RegisterTable = Map<string, RegisterValue>;

export type MachineState = {
  // 次に実行する命令の位置
  pc: number;
  regs: RegisterTable;
};

/**
 * 初期状態: pc = 0, ACC = 0。
 * それ以外のレジスタは最初の書き込みまで Map に含めない（未定義と 0 を区別する）
 */
export function initState(): MachineState {
  return { pc: 0, regs: new Map<string, RegisterValue>([[ACC, 0]]) };
}

export function cloneState(src: MachineState): MachineState {
  return { pc: src.pc, regs: new Map(src.regs) };
}

export function toWord(value: number): number {
  return value >>> 0;
}
