import { IlError } from "@/il-ast";

export class UnknownExpressionError extends IlError {
  readonly token: string;

  constructor(token: string, message = `Unknown expression: ${token}`) {
    super(message, { token });
    this.name = "UnknownExpressionError";
    this.token = token;
  }
}

// 識別子としては正しいが、まだ一度も書き込まれていないレジスタ
export class UndefinedRegisterError extends UnknownExpressionError {
  constructor(name: string) {
    super(name, `Undefined register: ${name}`);
    this.name = "UndefinedRegisterError";
  }
}

export class DivisionByZeroError extends IlError {
  constructor(pc: number) {
    super(`Division by zero at pc=${pc}`, { pc });
    this.name = "DivisionByZeroError";
  }
}

export class UndefinedLabelError extends IlError {
  readonly label: string;

  constructor(label: string, pc: number) {
    super(`Undefined label '${label}' at pc=${pc}`, { pc, label });
    this.name = "UndefinedLabelError";
    this.label = label;
  }
}
