import type { Operand } from "@/il-ast";
import { type MachineState, toWord } from "../core/state";
import { getReg, toNumber } from "../core/state-ops";
import { UndefinedRegisterError, UnknownExpressionError } from "../errors";
import type { NormalizedOptions } from "../options";

type EvalOptions = Pick<NormalizedOptions, "unknownExpression" | "logger">;

export function evalOperand(
  state: MachineState,
  operand: Operand,
  options: EvalOptions,
): number {
  try {
    return resolveOperand(state, operand);
  } catch (err) {
    if (
      options.unknownExpression === "zero" &&
      err instanceof UnknownExpressionError
    ) {
      options.logger.warn(
        `Error evaluating expression ${operand.text}: ${err.message}`,
      );
      return 0;
    }
    throw err;
  }
}

function resolveOperand(state: MachineState, operand: Operand): number {
  switch (operand.kind) {
    case "int":
      return toWord(operand.value);
    case "reg": {
      const value = getReg(state, operand.name);
      if (value === undefined) throw new UndefinedRegisterError(operand.name);
      return toWord(toNumber(value));
    }
    case "invalid":
      throw new UnknownExpressionError(operand.text);
  }
}
