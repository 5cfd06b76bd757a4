import type { RegisterSnapshot, TraceStep } from "@/lib/run-schema";
import type { Logger, TraceSink } from "./options";

export function formatRegisters(registers: RegisterSnapshot): string {
  const body = Object.entries(registers)
    .map(([name, value]) => `${name}: ${String(value)}`)
    .join(", ");
  return `{${body}}`;
}

// 各ステップ後のレジスタ表をそのまま出力するデバッグ用シンク
export function consoleTrace(logger: Pick<Logger, "log"> = console): TraceSink {
  return (step) => {
    logger.log(`Registers: ${formatRegisters(step.registers)}`);
  };
}

export function collectTrace(): { sink: TraceSink; steps: TraceStep[] } {
  const steps: TraceStep[] = [];
  return { sink: (step) => steps.push(step), steps };
}
