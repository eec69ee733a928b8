export * from './shared/protocol.js';
export * from './bridge/errors.js';
export { BinaryHeap } from './bridge/heap.js';
export { PriorityCommandQueue } from './bridge/command-queue.js';
export { OutputChannel } from './bridge/output-channel.js';
export { IntrospectionBridge, type Query, type IntrospectionStats } from './bridge/introspection.js';
export type { InterpreterBundle, InterpreterCore, StatusSnapshot, StepResult } from './engine/types.js';
export {
  EngineWorker,
  type EngineWorkerOptions,
  type WorkerExit,
  type WorkerExitReason,
  type WorkerPhase,
  type WorkerState,
} from './engine/worker.js';
export { DemoInterpreter, createDemoBundle, demoQueries, type DemoRoomView, type DemoState } from './engine/demo.js';
export {
  ProcessInterpreter,
  createProcessBundle,
  processQueries,
  type InterpreterProcess,
  type InterpreterSpawner,
  type ProcessInterpreterOptions,
  type ProcessState,
} from './engine/process.js';
export { withInterpreter, type InterpreterVisitor } from './engine/index.js';
export { sanitizeInput, type InputRejection, type SanitizedInput } from './control/input.js';
export {
  LifecycleController,
  lifecycleSettings,
  type CommandSink,
  type InputProducer,
  type LifecycleOptions,
  type LifecyclePhase,
  type ShutdownResult,
  type SourcePriorities,
  type SubmitResult,
} from './control/lifecycle.js';
export { Transcript, formatChunk, type TranscriptOptions } from './transports/transcript.js';
export { TerminalSession, formatStatus, parseMetaCommand, type MetaCommand, type TerminalSessionOptions } from './transports/terminal.js';
export { VoiceProducer, voiceProducerFor, type RecognizedPhrase, type SpeechRecognizer, type VoiceProducerOptions, type VoiceStats } from './transports/voice.js';
export { ScriptProducer, parseWalkthrough, type ScriptProducerOptions, type ScriptReport } from './transports/script.js';
export { runSession, applyCliOverrides, type SessionMode, type SessionOptions, type SessionOutcome } from './runtime/session.js';
export { Logger, createLogger, type LogLevel, type LogSink } from './utils/logger.js';
