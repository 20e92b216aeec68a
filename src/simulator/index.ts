export {
  Simulator,
  type SimulatorOptions,
  type SimulationResult,
  type UnresolvedReason,
} from './simulator.js';
export { RingScheduler, emptyStats, type SimulationStats } from './scheduler.js';
export { Ring } from './ring.js';
export { WireFrame, WireFrameStack } from './wire-frame.js';
export { nand, evaluateNand, NAND_IN_A, NAND_IN_B, NAND_OUT } from './nand.js';
export {
  toWire,
  fromWire,
  toBits,
  fromBits,
  wireToChar,
  formatWires,
  type Bit,
} from './bits.js';
