export {
  applyInstruction,
  applyBinary,
  type ExecContext,
} from "./apply-instruction";
export { evalOperand } from "./eval";
