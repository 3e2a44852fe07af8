// Closed set of CHIP-8 instruction forms. Field names follow the opcode pattern letters:
// x/y register indices, kk 8-bit immediate, n 4-bit immediate, addr 12-bit address.
export type Instruction =
  | { op: 'CLS' }                          // 00E0
  | { op: 'RET' }                          // 00EE
  | { op: 'JP'; addr: number }             // 1nnn
  | { op: 'CALL'; addr: number }           // 2nnn
  | { op: 'SE_IMM'; x: number; kk: number }   // 3xkk
  | { op: 'SNE_IMM'; x: number; kk: number }  // 4xkk
  | { op: 'SE_REG'; x: number; y: number }    // 5xy0
  | { op: 'LD_IMM'; x: number; kk: number }   // 6xkk
  | { op: 'ADD_IMM'; x: number; kk: number }  // 7xkk
  | { op: 'LD_REG'; x: number; y: number }    // 8xy0
  | { op: 'OR'; x: number; y: number }        // 8xy1
  | { op: 'AND'; x: number; y: number }       // 8xy2
  | { op: 'XOR'; x: number; y: number }       // 8xy3
  | { op: 'ADD_REG'; x: number; y: number }   // 8xy4
  | { op: 'SUB'; x: number; y: number }       // 8xy5
  | { op: 'SHR'; x: number; y: number }       // 8xy6
  | { op: 'SUBN'; x: number; y: number }      // 8xy7
  | { op: 'SHL'; x: number; y: number }       // 8xyE
  | { op: 'SNE_REG'; x: number; y: number }   // 9xy0
  | { op: 'LD_I'; addr: number }              // Annn
  | { op: 'JP_V0'; addr: number }             // Bnnn
  | { op: 'RND'; x: number; kk: number }      // Cxkk
  | { op: 'DRW'; x: number; y: number; n: number } // Dxyn
  | { op: 'SKP'; x: number }                  // Ex9E
  | { op: 'SKNP'; x: number }                 // ExA1
  | { op: 'LD_VX_DT'; x: number }             // Fx07
  | { op: 'LD_VX_K'; x: number }              // Fx0A
  | { op: 'LD_DT_VX'; x: number }             // Fx15
  | { op: 'LD_ST_VX'; x: number }             // Fx18
  | { op: 'ADD_I'; x: number }                // Fx1E
  | { op: 'LD_F'; x: number }                 // Fx29
  | { op: 'LD_B'; x: number }                 // Fx33
  | { op: 'LD_MEM_VX'; x: number }            // Fx55
  | { op: 'LD_VX_MEM'; x: number };           // Fx65

// Human-readable form for traces and error messages, e.g. "ADD V3, 0x10".
export function formatInstruction(ins: Instruction): string {
  const h = (v: number, w: number) => '0x' + v.toString(16).toUpperCase().padStart(w, '0');
  const v = (r: number) => 'V' + r.toString(16).toUpperCase();
  switch (ins.op) {
    case 'CLS': return 'CLS';
    case 'RET': return 'RET';
    case 'JP': return `JP ${h(ins.addr, 3)}`;
    case 'CALL': return `CALL ${h(ins.addr, 3)}`;
    case 'SE_IMM': return `SE ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'SNE_IMM': return `SNE ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'SE_REG': return `SE ${v(ins.x)}, ${v(ins.y)}`;
    case 'LD_IMM': return `LD ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'ADD_IMM': return `ADD ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'LD_REG': return `LD ${v(ins.x)}, ${v(ins.y)}`;
    case 'OR': return `OR ${v(ins.x)}, ${v(ins.y)}`;
    case 'AND': return `AND ${v(ins.x)}, ${v(ins.y)}`;
    case 'XOR': return `XOR ${v(ins.x)}, ${v(ins.y)}`;
    case 'ADD_REG': return `ADD ${v(ins.x)}, ${v(ins.y)}`;
    case 'SUB': return `SUB ${v(ins.x)}, ${v(ins.y)}`;
    case 'SHR': return `SHR ${v(ins.x)}`;
    case 'SUBN': return `SUBN ${v(ins.x)}, ${v(ins.y)}`;
    case 'SHL': return `SHL ${v(ins.x)}`;
    case 'SNE_REG': return `SNE ${v(ins.x)}, ${v(ins.y)}`;
    case 'LD_I': return `LD I, ${h(ins.addr, 3)}`;
    case 'JP_V0': return `JP V0, ${h(ins.addr, 3)}`;
    case 'RND': return `RND ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'DRW': return `DRW ${v(ins.x)}, ${v(ins.y)}, ${ins.n}`;
    case 'SKP': return `SKP ${v(ins.x)}`;
    case 'SKNP': return `SKNP ${v(ins.x)}`;
    case 'LD_VX_DT': return `LD ${v(ins.x)}, DT`;
    case 'LD_VX_K': return `LD ${v(ins.x)}, K`;
    case 'LD_DT_VX': return `LD DT, ${v(ins.x)}`;
    case 'LD_ST_VX': return `LD ST, ${v(ins.x)}`;
    case 'ADD_I': return `ADD I, ${v(ins.x)}`;
    case 'LD_F': return `LD F, ${v(ins.x)}`;
    case 'LD_B': return `LD B, ${v(ins.x)}`;
    case 'LD_MEM_VX': return `LD [I], ${v(ins.x)}`;
    case 'LD_VX_MEM': return `LD ${v(ins.x)}, [I]`;
  }
}
