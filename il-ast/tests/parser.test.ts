import { describe, it, expect } from "vitest";
import {
  ArityError,
  IlError,
  parse,
  parseLine,
  parseOperand,
  ParseError,
  UnknownInstructionError,
} from "..";

describe("API surface/type shape", () => {
  it("parse signature returns Program", () => {
    expect(typeof parse).toBe("function");
    const program = parse("NOT");
    expect(Array.isArray(program.instructions)).toBe(true);
    expect(program.labels).toBeInstanceOf(Map);
  });
});

describe("parseOperand", () => {
  it("classifies decimal literals", () => {
    expect(parseOperand("42")).toEqual({ kind: "int", value: 42, text: "42" });
  });

  it("classifies 16# literals as hexadecimal", () => {
    expect(parseOperand("16#F0")).toEqual({
      kind: "int",
      value: 240,
      text: "16#F0",
    });
    expect(parseOperand("16#ff").kind).toBe("int");
  });

  it("masks literals to 32 bits", () => {
    expect(parseOperand("4294967296")).toMatchObject({ kind: "int", value: 0 });
    expect(parseOperand("16#1FFFFFFFF")).toMatchObject({
      kind: "int",
      value: 4294967295,
    });
  });

  it("classifies identifiers as register references", () => {
    expect(parseOperand("Counter_1")).toEqual({
      kind: "reg",
      name: "Counter_1",
      text: "Counter_1",
    });
  });

  it("keeps malformed tokens as invalid operands", () => {
    expect(parseOperand("16#XYZ")).toEqual({ kind: "invalid", text: "16#XYZ" });
    expect(parseOperand("12AB")).toEqual({ kind: "invalid", text: "12AB" });
    expect(parseOperand("16#")).toEqual({ kind: "invalid", text: "16#" });
  });
});

describe("parseLine", () => {
  it("builds operand instructions", () => {
    expect(parseLine("LD 5")).toEqual({
      op: "LD",
      operand: { kind: "int", value: 5, text: "5" },
      text: "LD 5",
    });
    expect(parseLine("  XORN   A  ")).toEqual({
      op: "XORN",
      operand: { kind: "reg", name: "A", text: "A" },
      text: "XORN   A",
    });
  });

  it("builds variable and label instructions", () => {
    expect(parseLine("ST A")).toEqual({ op: "ST", target: "A", text: "ST A" });
    expect(parseLine("S X")).toEqual({ op: "S", target: "X", text: "S X" });
    expect(parseLine("JMPNC End")).toEqual({
      op: "JMPNC",
      label: "End",
      text: "JMPNC End",
    });
  });

  it("accepts NOT without operands", () => {
    expect(parseLine("NOT")).toEqual({ op: "NOT", text: "NOT" });
  });

  it("rejects unknown mnemonics", () => {
    expect(() => parseLine("HALT", 3)).toThrow(UnknownInstructionError);
    try {
      parseLine("ld 5", 7);
      throw new Error("expected failure");
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownInstructionError);
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toBeInstanceOf(IlError);
      if (!(err instanceof UnknownInstructionError)) throw err;
      expect(err.mnemonic).toBe("ld");
      expect(err.detail).toEqual({ sourceLine: 7, mnemonic: "ld" });
    }
  });

  it("rejects wrong operand counts", () => {
    expect(() => parseLine("LD")).toThrow(ArityError);
    expect(() => parseLine("NOT 1")).toThrow(ArityError);
    try {
      parseLine("ADD 1 2", 4);
      throw new Error("expected failure");
    } catch (err) {
      if (!(err instanceof ArityError)) throw err;
      expect(err.expected).toBe(1);
      expect(err.actual).toBe(2);
      expect(err.message).toBe("'ADD' takes 1 operand(s), got 2");
    }
  });

  it("rejects non-identifier store targets and labels", () => {
    expect(() => parseLine("ST 5")).toThrow(ParseError);
    expect(() => parseLine("JMP 16#10")).toThrow("Invalid label name '16#10'");
  });
});

describe("parse", () => {
  it("skips blank lines and binds labels to the next instruction", () => {
    const program = parse(`
    LD 1
    JMP Skip

    LD 0
    ST A
    Skip: LD 1
    ST B
    `);

    expect(program.instructions).toHaveLength(6);
    expect(program.labels.get("Skip")).toBe(4);
    expect(program.instructions[4]).toEqual({
      label: "Skip",
      instr: {
        op: "LD",
        operand: { kind: "int", value: 1, text: "1" },
        text: "LD 1",
      },
      sourceLine: 7,
      pc: 4,
    });
  });

  it("accepts label-only lines", () => {
    const program = parse("Loop:\nADD 1\nJMP Loop");
    expect(program.labels.get("Loop")).toBe(0);
    expect(program.instructions).toHaveLength(2);
    expect(program.instructions[0]?.label).toBe("Loop");
    expect(program.instructions[1]?.label).toBeUndefined();
  });

  it("binds a trailing label to the end of the program", () => {
    const program = parse("JMP End\nLD 1\nEnd:");
    expect(program.labels.get("End")).toBe(2);
    expect(program.instructions).toHaveLength(2);
  });

  it("does not resolve jump targets while loading", () => {
    const program = parse("JMP Nowhere");
    expect(program.instructions[0]?.instr).toEqual({
      op: "JMP",
      label: "Nowhere",
      text: "JMP Nowhere",
    });
  });

  it("ignores line-end comments", () => {
    const program = parse("LD 5 // five\n// full line comment\nST A");
    expect(program.instructions.map((i) => i.instr.text)).toEqual([
      "LD 5",
      "ST A",
    ]);
  });

  it("handles CRLF line endings", () => {
    const program = parse("LD 5\r\nST A\r\n");
    expect(program.instructions).toHaveLength(2);
    expect(program.instructions[1]?.sourceLine).toBe(2);
  });

  it("rejects duplicate labels", () => {
    expect(() => parse("A: LD 1\nA: LD 2")).toThrow("Duplicate label 'A'");
  });

  it("rejects malformed labels", () => {
    expect(() => parse(": LD 1")).toThrow(ParseError);
    expect(() => parse("my label: LD 1")).toThrow(
      "Invalid label 'my label'",
    );
  });

  it("aborts on the first unknown instruction with its source line", () => {
    try {
      parse("LD 1\n\nFOO 2\nBAR");
      throw new Error("expected failure");
    } catch (err) {
      if (!(err instanceof UnknownInstructionError)) throw err;
      expect(err.mnemonic).toBe("FOO");
      expect(err.detail).toEqual({ sourceLine: 3, mnemonic: "FOO" });
    }
  });
});
