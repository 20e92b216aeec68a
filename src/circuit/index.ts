export { CircuitTable } from './circuit-table.js';
export {
  resolveLimits,
  checkCircuitId,
  checkWireSlot,
  circuitProblem,
  isValidCircuit,
  emptyUsage,
  useAsInput,
  useAsOutput,
  inferWireUsage,
  layoutProblem,
  type WireRole,
  type WireUsage,
} from './validate.js';
