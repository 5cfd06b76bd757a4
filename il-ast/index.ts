export * from "./types/operand";
export * from "./types/instruction";
export * from "./types/program";
export { IlError } from "./lib/errors";
export {
  parse,
  parseLine,
  parseOperand,
  MNEMONICS,
  ParseError,
  UnknownInstructionError,
  ArityError,
} from "./lib/parser";
