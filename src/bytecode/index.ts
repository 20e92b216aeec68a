export {
  BytecodeDecoder,
  DecoderState,
  decode,
  type DecoderOptions,
  type DecodeStats,
  type CandidateView,
} from './decoder.js';
export {
  ByteReader,
  fromBytes,
  fromChunks,
  toChunkSource,
  type ByteSource,
  type ChunkSource,
} from './byte-reader.js';
export {
  classifyByte,
  isOperation,
  isDefineBoundary,
  defineByte,
  applyByte,
  literalByte,
  ID_MASK,
  LITERAL_MASK,
  type ByteKind,
  type DecodedByte,
} from './opcodes.js';
