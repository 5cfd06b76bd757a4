import { IlError } from "@/il-ast";
import { Machine, collectTrace, type MachineOptions } from "@/il-engine";
import {
  RUN_SCHEMA_VERSION,
  type RegisterSnapshot,
  type RunError,
  type RunErrorType,
  type RunResult,
  type TraceStep,
} from "@/lib/run-schema";

export type InterpretOptions = MachineOptions & {
  /** true の場合、各ステップのレジスタ表を result.trace に記録する */
  collectTrace?: boolean;
};

const IL_ERROR_TYPES: ReadonlySet<string> = new Set<RunErrorType>([
  "ParseError",
  "UnknownInstructionError",
  "ArityError",
  "UnknownExpressionError",
  "UndefinedRegisterError",
  "DivisionByZeroError",
  "UndefinedLabelError",
]);

function isRunErrorType(name: string): name is RunErrorType {
  return IL_ERROR_TYPES.has(name);
}

function toRunError(err: unknown): RunError {
  if (err instanceof IlError) {
    const { name } = err;
    if (isRunErrorType(name)) {
      return { type: name, message: err.message, detail: err.detail };
    }
  }
  const message =
    err instanceof Error ? err.message : "実行中に例外が発生しました";
  return { type: "InternalError", message, detail: err };
}

function buildResult(
  machine: Machine,
  registers: RegisterSnapshot,
  trace: TraceStep[] | undefined,
  error?: RunError,
): RunResult {
  return {
    schemaVersion: RUN_SCHEMA_VERSION,
    status: error ? "error" : "ok",
    registers,
    steps: machine.steps,
    ...(trace ? { trace } : {}),
    ...(error ? { error } : {}),
  };
}

/**
 * 読み込み → 実行をまとめて行うファサード。
 * 例外は投げず、error フィールドに詰めて返す。
 */
export function interpret(
  source: string,
  options: InterpretOptions = {},
): RunResult {
  const { collectTrace: wantTrace = false, ...machineOptions } = options;
  const collector = wantTrace ? collectTrace() : undefined;
  const userTrace = machineOptions.trace;

  const machine = new Machine({
    ...machineOptions,
    trace: (step) => {
      collector?.sink(step);
      userTrace?.(step);
    },
  });

  try {
    machine.loadProgram(source);
    machine.run();
  } catch (err) {
    return buildResult(
      machine,
      machine.snapshot(),
      collector?.steps,
      toRunError(err),
    );
  }
  return buildResult(machine, machine.snapshot(), collector?.steps);
}
