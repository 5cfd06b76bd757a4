import type { RegisterSnapshot } from "@/lib/run-schema";
import { ACC, type MachineState, type RegisterValue, toWord } from "./state";

export function getReg(
  state: MachineState,
  name: string,
): RegisterValue | undefined {
  return state.regs.get(name);
}

// ACC への書き込みは常に 32 bit 整数に正規化する
export function setReg(state: MachineState, name: string, value: RegisterValue) {
  state.regs.set(name, name === ACC ? toWord(toNumber(value)) : value);
}

export function getAcc(state: MachineState): number {
  return toNumber(state.regs.get(ACC) ?? 0);
}

export function setAcc(state: MachineState, value: number) {
  setReg(state, ACC, value);
}

export function toNumber(value: RegisterValue): number {
  if (typeof value === "boolean") return value ? 1 : 0;
  return value;
}

export function isTruthy(value: RegisterValue): boolean {
  return typeof value === "boolean" ? value : value !== 0;
}

export function snapshotRegisters(state: MachineState): RegisterSnapshot {
  return Object.fromEntries(state.regs);
}
