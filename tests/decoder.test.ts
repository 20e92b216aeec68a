import { describe, it, expect, vi } from 'vitest';
import {
  BytecodeDecoder,
  DecoderState,
  DecodeError,
  DecodeErrorType,
  ResourceError,
  ResourceErrorType,
  decode,
  fromBytes,
} from '../src/index.js';

// Step until `count` bytes of the stream have been consumed
function stepUntilBytes(decoder: BytecodeDecoder, count: number): void {
  while (decoder.getStats().bytes < count) {
    decoder.step();
  }
}

const NOT = [
  0b1100_0001, // DEF 1
  0b1000_0000, // APPLY 0
  0b0000_0000, // 0
  0b0000_0000, // 0
  0b0000_0001, // 1
  0b1100_0001, // DEF 1
];

const AND = [
  0b1100_0010, // DEF 2
  0b1000_0000, // APPLY 0
  0b0000_0000, // 0
  0b0000_0001, // 1
  0b0000_0011, // 3
  0b1000_0001, // APPLY 1
  0b0000_0011, // 3
  0b0000_0010, // 2
  0b1100_0010, // DEF 2
];

describe('Decoder', () => {
  describe('definitions', () => {
    it('should decode NOT and AND', () => {
      const table = decode([...NOT, ...AND]);
      expect(table.lookup(1)).toEqual({
        inputCount: 1,
        outputCount: 1,
        modules: [{ circuitId: 0, wiring: [0, 0, 1] }],
      });
      expect(table.lookup(2)).toEqual({
        inputCount: 2,
        outputCount: 1,
        modules: [
          { circuitId: 0, wiring: [0, 1, 3] },
          { circuitId: 1, wiring: [3, 2] },
        ],
      });
      expect(table.ids()).toEqual([0, 1, 2]);
    });

    it('should freeze the table unless asked not to', () => {
      expect(decode(NOT).isFrozen).toBe(true);
      expect(decode(NOT, { freeze: false }).isFrozen).toBe(false);
    });

    it('should decode an empty stream to a table holding only NAND', () => {
      const table = decode([]);
      expect(table.ids()).toEqual([0]);
    });

    it('should decode into an existing table', () => {
      const table = decode(NOT, { freeze: false });
      decode(AND, { table });
      expect(table.lookup(2).inputCount).toBe(2);
      expect(table.isFrozen).toBe(true);
    });

    it('should refuse to decode into a frozen table', () => {
      const table = decode(NOT);
      expect(() => decode(AND, { table })).toThrow(/frozen/);
    });

    it('should decode the same stream served one byte at a time', () => {
      const table = decode(fromBytes([...NOT, ...AND], 1), { limits: { readBufferSize: 2 } });
      expect(table.lookup(2).modules).toEqual([
        { circuitId: 0, wiring: [0, 1, 3] },
        { circuitId: 1, wiring: [3, 2] },
      ]);
    });

    it('should report decode statistics', () => {
      const decoder = new BytecodeDecoder([...NOT, ...AND]);
      decoder.run();
      expect(decoder.getStats()).toEqual({ definitions: 2, modules: 3, bytes: 15 });
    });
  });

  describe('state machine', () => {
    it('should walk the states of a single definition', () => {
      const decoder = new BytecodeDecoder(NOT);
      const states: DecoderState[] = [];
      while (decoder.state !== DecoderState.Halt) {
        states.push(decoder.step());
      }
      expect(states).toEqual([
        DecoderState.StartDefine,
        DecoderState.DefineIter,
        DecoderState.StartApply,
        DecoderState.ReadArgs,
        DecoderState.ReadArgs,
        DecoderState.ReadArgs,
        DecoderState.AddInstruction,
        DecoderState.DefineIter,
        DecoderState.EndDef,
        DecoderState.Begin,
        DecoderState.Halt,
      ]);
    });

    it('should stay halted', () => {
      const decoder = new BytecodeDecoder([]);
      expect(decoder.step()).toBe(DecoderState.Halt);
      expect(decoder.step()).toBe(DecoderState.Halt);
    });

    it('should log transitions when verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      decode(NOT, { verbose: true });
      expect(log).toHaveBeenCalledTimes(11);
      expect(log.mock.calls[0][0]).toBe('[decoder] Begin -> StartDefine (byte 1)');
      log.mockRestore();
    });
  });

  describe('arity inference', () => {
    it('should count fresh wires as inputs and outputs', () => {
      const decoder = new BytecodeDecoder([...NOT, ...AND]);
      stepUntilBytes(decoder, 11);
      expect(decoder.state).toBe(DecoderState.AddInstruction);
      expect(decoder.candidate).toEqual({ id: 2, inputCount: 2, outputCount: 1, moduleCount: 0 });
      expect(decoder.wireRole(0)).toBe('input');
      expect(decoder.wireRole(1)).toBe('input');
      expect(decoder.wireRole(3)).toBe('output');
      expect(decoder.wireRole(2)).toBe('unused');
    });

    it('should turn a produced wire that is consumed later into an intermediate', () => {
      const decoder = new BytecodeDecoder([...NOT, ...AND]);
      stepUntilBytes(decoder, 13);
      // Wire 3 was an output of the first module and is now an input of the second
      expect(decoder.candidate).toEqual({ id: 2, inputCount: 2, outputCount: 0, moduleCount: 1 });
      expect(decoder.wireRole(3)).toBe('intermediate');

      stepUntilBytes(decoder, 14);
      expect(decoder.candidate).toEqual({ id: 2, inputCount: 2, outputCount: 1, moduleCount: 1 });
      expect(decoder.wireRole(2)).toBe('output');
    });

    it('should turn a consumed wire that is produced later into an intermediate', () => {
      // Same gate as AND, modules in reverse order
      const bytes = [0xc1, 0x80, 3, 3, 2, 0x80, 0, 1, 3, 0xc1];
      const decoder = new BytecodeDecoder(bytes);
      stepUntilBytes(decoder, 8);
      expect(decoder.candidate).toMatchObject({ inputCount: 3, outputCount: 1 });

      stepUntilBytes(decoder, 9);
      expect(decoder.candidate).toMatchObject({ inputCount: 2, outputCount: 1 });
      expect(decoder.wireRole(3)).toBe('intermediate');

      const table = decoder.run();
      expect(table.lookup(1)).toMatchObject({ inputCount: 2, outputCount: 1 });
    });

    it('should never reclassify an intermediate wire', () => {
      const bytes = [
        0xc3,
        0x80, 0, 1, 2, // 2 is an output
        0x80, 2, 2, 3, // 2 becomes intermediate, 3 is an output
        0x80, 2, 0, 4, // 2 stays intermediate, 4 is an output
        0x80, 3, 4, 2, // 3 and 4 become intermediate, 2 stays intermediate
        0xc3,
      ];
      const decoder = new BytecodeDecoder(bytes);

      stepUntilBytes(decoder, 13);
      expect(decoder.candidate).toEqual({ id: 3, inputCount: 2, outputCount: 2, moduleCount: 2 });
      expect(decoder.wireRole(2)).toBe('intermediate');

      stepUntilBytes(decoder, 17);
      expect(decoder.candidate).toEqual({ id: 3, inputCount: 2, outputCount: 0, moduleCount: 3 });
      expect(decoder.wireRole(2)).toBe('intermediate');
      expect(decoder.wireRole(3)).toBe('intermediate');
      expect(decoder.wireRole(4)).toBe('intermediate');

      // No outputs left
      expect(() => decoder.run()).toThrow(expect.objectContaining({ type: DecodeErrorType.INVALID_CIRCUIT }));
      expect(decoder.table.isDefined(3)).toBe(false);
    });

    it('should infer the arity of the four-bit adder', () => {
      const bytes = [
        ...NOT, ...AND,
        // OR
        0xc3, 0x80, 0, 0, 3, 0x80, 1, 1, 4, 0x80, 3, 4, 2, 0xc3,
        // XOR
        0xc5, 0x80, 0, 1, 3, 0x80, 0, 3, 4, 0x80, 1, 3, 5, 0x80, 4, 5, 2, 0xc5,
        // FULL_ADDER
        0xc7, 0x85, 0, 1, 5, 0x85, 5, 2, 4, 0x82, 5, 2, 6, 0x82, 0, 1, 7, 0x83, 6, 7, 3, 0xc7,
        // ADDER4
        0xc8,
        0x87, 0x03, 0x07, 0x08, 0x0e, 0x0d,
        0x87, 0x02, 0x06, 0x0e, 0x0f, 0x0c,
        0x87, 0x01, 0x05, 0x0f, 0x10, 0x0b,
        0x87, 0x00, 0x04, 0x10, 0x09, 0x0a,
        0xc8,
      ];
      const table = decode(bytes);
      expect(table.lookup(3)).toMatchObject({ inputCount: 2, outputCount: 1 });
      expect(table.lookup(5)).toMatchObject({ inputCount: 2, outputCount: 1 });
      expect(table.lookup(7)).toMatchObject({ inputCount: 3, outputCount: 2 });
      expect(table.lookup(8)).toMatchObject({ inputCount: 9, outputCount: 5 });
    });
  });

  describe('rejections', () => {
    it('should reject redefining NAND', () => {
      expect(() => decode([0xc0, 0x80, 0, 1, 2, 0xc0])).toThrow(DecodeError);
      expect(() => decode([0xc0, 0x80, 0, 1, 2, 0xc0])).toThrow(expect.objectContaining({
        type: DecodeErrorType.REDEFINITION,
        offset: 0,
      }));
    });

    it('should reject redefining a decoded circuit', () => {
      expect(() => decode([...NOT, ...NOT])).toThrow(expect.objectContaining({
        type: DecodeErrorType.REDEFINITION,
        offset: 6,
      }));
    });

    it('should reject applying an undefined circuit', () => {
      expect(() => decode([0xc1, 0x85, 0, 1, 0xc1])).toThrow(expect.objectContaining({
        type: DecodeErrorType.UNDEFINED_CIRCUIT,
        offset: 1,
      }));
    });

    it('should reject a circuit applying itself', () => {
      expect(() => decode([0xc1, 0x81, 0, 1, 0xc1])).toThrow(expect.objectContaining({
        type: DecodeErrorType.UNDEFINED_CIRCUIT,
      }));
    });

    it('should reject a definition without modules', () => {
      expect(() => decode([0xc1, 0xc1])).toThrow(expect.objectContaining({
        type: DecodeErrorType.INVALID_CIRCUIT,
      }));
    });

    it('should reject a stream ending inside a definition', () => {
      expect(() => decode([0xc1, 0x80, 0, 0, 1])).toThrow(expect.objectContaining({
        type: DecodeErrorType.TRUNCATED,
        offset: 5,
      }));
      expect(() => decode([0xc1])).toThrow(expect.objectContaining({ type: DecodeErrorType.TRUNCATED }));
    });

    it('should reject a stream ending inside an argument list', () => {
      expect(() => decode([0xc1, 0x80, 0])).toThrow(expect.objectContaining({
        type: DecodeErrorType.TRUNCATED,
        offset: 3,
      }));
    });

    it('should reject too few arguments', () => {
      expect(() => decode([0xc1, 0x80, 0, 0, 0xc1])).toThrow(expect.objectContaining({
        type: DecodeErrorType.MISSING_ARGUMENTS,
        offset: 4,
      }));
    });

    it('should reject apply and literals outside a definition', () => {
      expect(() => decode([0x80])).toThrow(expect.objectContaining({
        type: DecodeErrorType.UNEXPECTED_APPLY,
      }));
      expect(() => decode([0x05])).toThrow(expect.objectContaining({
        type: DecodeErrorType.UNEXPECTED_LITERAL,
      }));
    });

    it('should reject a literal without an apply', () => {
      expect(() => decode([0xc1, 0x05])).toThrow(expect.objectContaining({
        type: DecodeErrorType.UNEXPECTED_LITERAL,
        offset: 1,
      }));
    });

    it('should reject a definition closed with another id', () => {
      expect(() => decode([0xc1, 0x80, 0, 0, 1, 0xc2])).toThrow(expect.objectContaining({
        type: DecodeErrorType.MISMATCHED_DEFINE,
        offset: 5,
      }));
    });

    it('should reject inputs and outputs out of slot order', () => {
      // Output in slot 0 and input in slot 1
      expect(() => decode([0xc1, 0x80, 1, 1, 0, 0xc1])).toThrow(expect.objectContaining({
        type: DecodeErrorType.INVALID_CIRCUIT,
      }));
    });

    it('should reject wire slots beyond the frame', () => {
      expect(() => decode([0xc1, 0x80, 0, 0, 0x40, 0xc1])).toThrow(ResourceError);
      expect(() => decode([0xc1, 0x80, 0, 0, 0x40, 0xc1])).toThrow(expect.objectContaining({
        type: ResourceErrorType.WIRE_OUT_OF_RANGE,
      }));
    });

    it('should reject too many modules', () => {
      const bytes = [0xc1, 0x80, 0, 0, 1, 0x80, 0, 0, 1, 0x80, 0, 0, 1, 0xc1];
      expect(() => decode(bytes, { limits: { maxModules: 2 } })).toThrow(expect.objectContaining({
        type: ResourceErrorType.TOO_MANY_MODULES,
      }));
    });

    it('should reject ids beyond the table', () => {
      expect(() => decode([0xc5, 0x80, 0, 0, 1, 0xc5], { limits: { maxCircuits: 4 } })).toThrow(expect.objectContaining({
        type: ResourceErrorType.CIRCUIT_ID_OUT_OF_RANGE,
      }));
    });

    it('should keep earlier definitions but not the failing one', () => {
      const decoder = new BytecodeDecoder([...NOT, 0xc2, 0x80, 0, 1]);
      expect(() => decoder.run()).toThrow(expect.objectContaining({ type: DecodeErrorType.TRUNCATED }));
      expect(decoder.table.isDefined(1)).toBe(true);
      expect(decoder.table.isDefined(2)).toBe(false);
    });
  });
});
