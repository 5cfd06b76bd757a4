import { describe, it, expect } from "vitest";
import { Machine } from "..";

// 読み込み → 実行 → 期待レジスタの照合（undefined は「未作成」を意味する）
function runProgram(
  program: string,
  expected: Record<string, number | boolean | undefined>,
) {
  const machine = new Machine();
  machine.loadProgram(program);
  machine.run();
  for (const [name, value] of Object.entries(expected)) {
    expect(machine.get(name), `register ${name}`).toBe(value);
  }
}

describe("demonstration programs", () => {
  it("load/store", () => {
    runProgram(
      `
      LD 5
      ST A
      `,
      { A: 5 },
    );
  });

  it("set/reset", () => {
    runProgram(
      `
      LD 1
      S X
      R Y
      `,
      { X: true, Y: false },
    );
  });

  it("logical operations", () => {
    runProgram(
      `
      LD 16#F0
      AND 16#0F
      ST A
      LD 16#F0
      ANDN 16#0F
      ST B
      LD 16#F0
      OR 16#0F
      ST C
      LD 16#F0
      ORN 16#0F
      ST D
      LD 16#F0
      XOR 16#FF
      ST E
      LD 16#F0
      XORN 16#FF
      ST F
      LD 1
      NOT
      ST G
      `,
      {
        A: 0,
        B: 240,
        C: 255,
        D: 4294967280,
        E: 15,
        F: 4294967280,
        G: 4294967294,
      },
    );
  });

  it("arithmetic operations", () => {
    runProgram(
      `
      LD 10
      ADD 5
      ST A
      LD 10
      SUB 3
      ST B
      LD 2
      MUL 4
      ST C
      LD 20
      DIV 4
      ST D
      LD 20
      MOD 3
      ST E
      `,
      { A: 15, B: 7, C: 8, D: 5, E: 2 },
    );
  });

  it("control flow", () => {
    runProgram(
      `
      LD 1
      JMP Skip
      LD 0
      ST A
      Skip: LD 1
      ST B
      LD 1
      JMPC Done
      LD 0
      ST C
      Done: LD 1
      ST D
      LD 0
      JMPNC End
      LD 0
      ST E
      End: LD 1
      ST F
      `,
      { A: undefined, B: 1, C: undefined, D: 1, E: undefined, F: 1 },
    );
  });
});
