import type { TraceStep } from "@/lib/run-schema";

export type Logger = Pick<Console, "log" | "warn">;

export type TraceSink = (step: TraceStep) => void;

/**
 * 未解決オペランドの扱い:
 * - "error": UnknownExpressionError を投げて実行を中断する
 * - "zero": logger に警告を出して 0 として扱う
 */
export type UnknownExpressionPolicy = "error" | "zero";

export type MachineOptions = {
  trace?: TraceSink;
  unknownExpression?: UnknownExpressionPolicy;
  logger?: Logger;
};

export type NormalizedOptions = Required<MachineOptions>;

const noopTrace: TraceSink = () => {};

export function normalizeOptions(
  options: MachineOptions = {},
): NormalizedOptions {
  const unknownExpression = options.unknownExpression ?? "error";

  if (unknownExpression !== "error" && unknownExpression !== "zero") {
    throw new Error(
      `unknownExpression must be "error" or "zero" (got: ${String(
        unknownExpression,
      )})`,
    );
  }

  return {
    trace: options.trace ?? noopTrace,
    unknownExpression,
    logger: options.logger ?? console,
  };
}
