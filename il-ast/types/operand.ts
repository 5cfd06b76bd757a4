// オペランドと識別子の型定義

export type Identifier = string;
export type Register = Identifier;

export type Operand =
  | { kind: "int"; value: number; text: string }
  | { kind: "reg"; name: Register; text: string }
  // リテラルにも識別子にもならないトークン。評価時にのみエラーになる
  | { kind: "invalid"; text: string };
