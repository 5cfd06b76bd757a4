export const RUN_SCHEMA_VERSION = "1.0.0" as const;

/** レジスタ値。S/R で書かれた変数のみ boolean を取る */
export type RegisterValue = number | boolean;

export type RegisterSnapshot = Record<string, RegisterValue>;

export type RunResult = {
  /** 互換性管理のためのスキーマバージョン */
  schemaVersion: typeof RUN_SCHEMA_VERSION;
  status: "ok" | "error";
  /** 終了時点（エラー時は失敗直前）のレジスタ表 */
  registers: RegisterSnapshot;
  /** 実行を完了した命令数 */
  steps: number;
  /** collectTrace 指定時のみ */
  trace?: TraceStep[];
  error?: RunError;
};

export type RunErrorType =
  | "ParseError"
  | "UnknownInstructionError"
  | "ArityError"
  | "UnknownExpressionError"
  | "UndefinedRegisterError"
  | "DivisionByZeroError"
  | "UndefinedLabelError"
  | "InternalError";

export type RunError = {
  type: RunErrorType;
  message: string;
  detail?: unknown;
};

export type TraceStep = {
  /** 1 始まりの実行ステップ番号 */
  step: number;
  /** 実行した命令の PC */
  pc: number;
  sourceLine?: number;
  instruction: string;
  /** 命令実行後のレジスタ表 */
  registers: RegisterSnapshot;
};
