import { parse, type Program } from "@/il-ast";
import type { RegisterSnapshot } from "@/lib/run-schema";
import {
  initState,
  type MachineState,
  type RegisterValue,
} from "./core/state";
import { getReg, snapshotRegisters } from "./core/state-ops";
import {
  normalizeOptions,
  type MachineOptions,
  type NormalizedOptions,
} from "./options";
import { applyInstruction } from "./semantics/apply-instruction";

const emptyProgram = (): Program => ({ instructions: [], labels: new Map() });

/**
 * IL インタプリタ本体。
 * 状態は (pc, レジスタ表) のみで、pc が命令数に達した時点で停止する。
 */
export class Machine {
  private readonly options: NormalizedOptions;
  private current: Program = emptyProgram();
  private state: MachineState = initState();
  private executed = 0;

  constructor(options: MachineOptions = {}) {
    this.options = normalizeOptions(options);
  }

  /** ソースを解析して読み込む。解析に失敗した場合は何も変更しない */
  loadProgram(source: string): void {
    this.load(parse(source));
  }

  load(program: Program): void {
    this.current = program;
    this.reset();
  }

  reset(): void {
    this.state = initState();
    this.executed = 0;
  }

  get program(): Program {
    return this.current;
  }

  get pc(): number {
    return this.state.pc;
  }

  get steps(): number {
    return this.executed;
  }

  get registers(): ReadonlyMap<string, RegisterValue> {
    return this.state.regs;
  }

  get(name: string): RegisterValue | undefined {
    return getReg(this.state, name);
  }

  snapshot(): RegisterSnapshot {
    return snapshotRegisters(this.state);
  }

  get halted(): boolean {
    return this.state.pc >= this.current.instructions.length;
  }

  /** 1 命令実行する。実行する命令が無ければ false */
  step(): boolean {
    const item = this.current.instructions[this.state.pc];
    if (!item) return false;

    // 失敗時は state を差し替えないので、レジスタ表は失敗直前のまま残る
    const next = applyInstruction(item.instr, this.state, {
      labels: this.current.labels,
      options: this.options,
    });
    next.pc += 1;
    this.state = next;
    this.executed += 1;

    this.options.trace({
      step: this.executed,
      pc: item.pc,
      sourceLine: item.sourceLine,
      instruction: item.instr.text,
      registers: snapshotRegisters(next),
    });
    return true;
  }

  run(): void {
    while (this.state.pc < this.current.instructions.length) {
      this.step();
    }
  }
}
