export { isRuntimeError, RuntimeError } from './errors.ts'
export { type ExecuteOptions, execute } from './execute.ts'
export { type AbortHook, anyOf, createDeadline, createStepLimit } from './hooks.ts'
export { BufferInput, BufferOutput, type InputSource, type OutputSink } from './io.ts'
export { Machine } from './machine.ts'
export { DEFAULT_TAPE_SIZE, Tape } from './tape.ts'
