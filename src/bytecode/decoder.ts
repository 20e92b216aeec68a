// Bytecode decoder: a state machine that turns a byte stream into circuit definitions
//
//   Begin -> StartDefine -> DefineIter <-> (StartApply -> ReadArgs -> AddInstruction)
//                               |
//                               v
//                             EndDef -> Begin ... -> Halt
//
// Circuit arity is never declared. It is inferred from the order in which wire slots
// are first used as inputs or outputs of the applied modules.

import { CircuitTable } from '../circuit/circuit-table.js';
import {
  checkCircuitId,
  checkWireSlot,
  circuitProblem,
  emptyUsage,
  layoutProblem,
  useAsInput,
  useAsOutput,
  type WireRole,
  type WireUsage,
} from '../circuit/validate.js';
import { CircuitId, MachineLimits, Module, WireSlot } from '../types/circuit.js';
import {
  DecodeError,
  DecodeErrorType,
  ResourceError,
  ResourceErrorType,
} from '../types/errors.js';
import { ByteReader, ByteSource } from './byte-reader.js';
import { classifyByte, isOperation } from './opcodes.js';

export enum DecoderState {
  Begin = 'Begin',
  StartDefine = 'StartDefine',
  DefineIter = 'DefineIter',
  StartApply = 'StartApply',
  ReadArgs = 'ReadArgs',
  AddInstruction = 'AddInstruction',
  EndDef = 'EndDef',
  Halt = 'Halt',
}

export interface DecoderOptions {
  // Capacities for a fresh table; ignored when a table is given
  limits: Partial<MachineLimits>;
  // Decode into an existing, unfrozen table
  table?: CircuitTable;
  // Freeze the table once decode() halts
  freeze: boolean;
  // Log every state transition
  verbose: boolean;
}

const DEFAULT_OPTIONS: DecoderOptions = {
  limits: {},
  freeze: true,
  verbose: false,
};

export interface DecodeStats {
  definitions: number;
  modules: number;
  bytes: number;
}

export interface CandidateView {
  id: CircuitId;
  inputCount: number;
  outputCount: number;
  moduleCount: number;
}

export class BytecodeDecoder {
  readonly table: CircuitTable;
  private readonly limits: MachineLimits;
  private readonly reader: ByteReader;
  private readonly verbose: boolean;

  private current: DecoderState = DecoderState.Begin;
  // Last operation byte and where it was read
  private byte: number = 0;
  private byteOffset: number = 0;

  // Definition being built
  private defineId: CircuitId = -1;
  private modules: Module[] = [];
  private usage: WireUsage;

  // Application being read
  private applyTarget: CircuitId = -1;
  private applyInputs: number = 0;
  private applyOutputs: number = 0;
  private args: WireSlot[] = [];

  private stats: DecodeStats = { definitions: 0, modules: 0, bytes: 0 };

  constructor(source: ByteSource, options: Partial<DecoderOptions> = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    this.table = opts.table ?? new CircuitTable(opts.limits);
    if (this.table.isFrozen) {
      throw new Error('Cannot decode into a frozen circuit table');
    }
    this.limits = this.table.limits;
    this.reader = new ByteReader(source, this.limits.readBufferSize);
    this.verbose = opts.verbose;
    this.usage = emptyUsage(this.limits.wireCapacity);
  }

  get state(): DecoderState {
    return this.current;
  }

  get candidate(): CandidateView {
    return {
      id: this.defineId,
      inputCount: this.usage.inputCount,
      outputCount: this.usage.outputCount,
      moduleCount: this.modules.length,
    };
  }

  wireRole(slot: WireSlot): WireRole {
    checkWireSlot(slot, this.limits);
    return this.usage.roles[slot];
  }

  getStats(): DecodeStats {
    return { ...this.stats, bytes: this.reader.position };
  }

  /**
   * Drive the state machine until the stream is exhausted
   */
  run(): CircuitTable {
    while (this.current !== DecoderState.Halt) {
      this.step();
    }
    return this.table;
  }

  /**
   * Perform a single transition and return the new state
   */
  step(): DecoderState {
    const from = this.current;
    switch (from) {
      case DecoderState.Begin:
        this.current = this.begin();
        break;
      case DecoderState.StartDefine:
        this.current = this.startDefine();
        break;
      case DecoderState.DefineIter:
        this.current = this.defineIter();
        break;
      case DecoderState.StartApply:
        this.current = this.startApply();
        break;
      case DecoderState.ReadArgs:
        this.current = this.readArgs();
        break;
      case DecoderState.AddInstruction:
        this.current = this.addInstruction();
        break;
      case DecoderState.EndDef:
        this.current = this.endDef();
        break;
      case DecoderState.Halt:
        break;
    }
    if (this.verbose) {
      console.log(`[decoder] ${from} -> ${this.current} (byte ${this.reader.position})`);
    }
    return this.current;
  }

  private readOperation(): number | null {
    this.byteOffset = this.reader.position;
    const b = this.reader.read();
    if (b !== null) {
      this.byte = b;
    }
    return b;
  }

  private begin(): DecoderState {
    const b = this.readOperation();
    if (b === null) {
      return DecoderState.Halt;
    }
    const { kind } = classifyByte(b);
    switch (kind) {
      case 'define':
        return DecoderState.StartDefine;
      case 'apply':
        throw new DecodeError(
          DecodeErrorType.UNEXPECTED_APPLY,
          'Apply outside of a definition',
          this.byteOffset
        );
      case 'literal':
        throw new DecodeError(
          DecodeErrorType.UNEXPECTED_LITERAL,
          'Literal outside of a definition',
          this.byteOffset
        );
    }
  }

  private startDefine(): DecoderState {
    const id = classifyByte(this.byte).operand;
    checkCircuitId(id, this.limits);
    if (this.table.isDefined(id)) {
      throw new DecodeError(
        DecodeErrorType.REDEFINITION,
        `Circuit ${id} is already defined`,
        this.byteOffset
      );
    }
    this.defineId = id;
    this.modules = [];
    this.usage = emptyUsage(this.limits.wireCapacity);
    return DecoderState.DefineIter;
  }

  private defineIter(): DecoderState {
    const b = this.readOperation();
    if (b === null) {
      throw new DecodeError(
        DecodeErrorType.TRUNCATED,
        `Stream ended inside the definition of circuit ${this.defineId}`,
        this.reader.position
      );
    }
    const { kind } = classifyByte(b);
    switch (kind) {
      case 'define':
        return DecoderState.EndDef;
      case 'apply':
        return DecoderState.StartApply;
      case 'literal':
        throw new DecodeError(
          DecodeErrorType.UNEXPECTED_LITERAL,
          `Literal without an apply in circuit ${this.defineId}`,
          this.byteOffset
        );
    }
  }

  private startApply(): DecoderState {
    const target = classifyByte(this.byte).operand;
    if (!this.table.isDefined(target)) {
      throw new DecodeError(
        DecodeErrorType.UNDEFINED_CIRCUIT,
        `Circuit ${this.defineId} applies undefined circuit ${target}`,
        this.byteOffset
      );
    }
    const circuit = this.table.lookup(target);
    this.applyTarget = target;
    this.applyInputs = circuit.inputCount;
    this.applyOutputs = circuit.outputCount;
    this.args = [];
    return DecoderState.ReadArgs;
  }

  private readArgs(): DecoderState {
    const next = this.reader.peek();
    if (next === null) {
      throw new DecodeError(
        DecodeErrorType.TRUNCATED,
        `Stream ended while reading arguments of circuit ${this.applyTarget}`,
        this.reader.position
      );
    }
    if (isOperation(next)) {
      throw new DecodeError(
        DecodeErrorType.MISSING_ARGUMENTS,
        `Circuit ${this.applyTarget} expects ${this.applyInputs + this.applyOutputs} arguments, got ${this.args.length}`,
        this.reader.position
      );
    }

    const offset = this.reader.position;
    this.reader.read();
    const slot = classifyByte(next).operand;
    if (slot >= this.limits.wireCapacity) {
      throw new ResourceError(
        ResourceErrorType.WIRE_OUT_OF_RANGE,
        `Wire slot ${slot} outside 0..${this.limits.wireCapacity - 1} at byte ${offset}`
      );
    }

    if (this.args.length < this.applyInputs) {
      useAsInput(this.usage, slot);
    } else {
      useAsOutput(this.usage, slot);
    }
    this.args.push(slot);

    return this.args.length === this.applyInputs + this.applyOutputs
      ? DecoderState.AddInstruction
      : DecoderState.ReadArgs;
  }

  private addInstruction(): DecoderState {
    if (this.modules.length >= this.limits.maxModules) {
      throw new ResourceError(
        ResourceErrorType.TOO_MANY_MODULES,
        `Circuit ${this.defineId} has more than ${this.limits.maxModules} modules`
      );
    }
    this.modules.push({ circuitId: this.applyTarget, wiring: this.args });
    this.args = [];
    return DecoderState.DefineIter;
  }

  private endDef(): DecoderState {
    const closingId = classifyByte(this.byte).operand;
    if (closingId !== this.defineId) {
      throw new DecodeError(
        DecodeErrorType.MISMATCHED_DEFINE,
        `Definition of circuit ${this.defineId} closed with id ${closingId}`,
        this.byteOffset
      );
    }

    const circuit = {
      inputCount: this.usage.inputCount,
      outputCount: this.usage.outputCount,
      modules: this.modules,
    };
    const problem = circuitProblem(circuit, this.limits) ?? layoutProblem(circuit, this.usage);
    if (problem !== null) {
      throw new DecodeError(
        DecodeErrorType.INVALID_CIRCUIT,
        `Circuit ${this.defineId} is invalid: ${problem}`,
        this.byteOffset
      );
    }

    this.table.define(this.defineId, circuit);
    this.stats.definitions++;
    this.stats.modules += this.modules.length;
    return DecoderState.Begin;
  }
}

/**
 * Decode a byte stream into a circuit table, frozen by default
 */
export function decode(source: ByteSource, options: Partial<DecoderOptions> = {}): CircuitTable {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const table = new BytecodeDecoder(source, opts).run();
  if (opts.freeze) {
    table.freeze();
  }
  return table;
}
