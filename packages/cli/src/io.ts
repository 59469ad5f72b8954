import { readSync, writeSync } from 'node:fs'
import type { InputSource, OutputSink } from '@tapeworm/compiler'
import { isNodeError } from './utils.ts'

const CHUNK_SIZE = 4096

/** Wait before polling a descriptor that answered EAGAIN again */
export const RETRY_DELAY_MS = 10

const sleeper = new Int32Array(new SharedArrayBuffer(4))

/** Blocks the calling thread for `ms`. */
function pause(ms: number): void {
	Atomics.wait(sleeper, 0, 0, ms)
}

function isRetryable(error: unknown): boolean {
	return isNodeError(error) && error.code === 'EAGAIN'
}

export type ReadBytes = (fd: number, buffer: Buffer) => number
export type WriteBytes = (fd: number, data: Buffer) => number

const readBytes: ReadBytes = (fd, buffer) => readSync(fd, buffer, 0, buffer.length, null)
const writeBytes: WriteBytes = (fd, data) => writeSync(fd, data)

/**
 * Synchronous byte reader over a file descriptor, stdin by default.
 * The executor is synchronous, so input is pulled with readSync; a
 * non-blocking descriptor answering EAGAIN is polled again after
 * RETRY_DELAY_MS.
 */
export class FdInput implements InputSource {
	private readonly fd: number
	private readonly readBytes: ReadBytes
	private readonly chunk = Buffer.alloc(CHUNK_SIZE)
	private length = 0
	private position = 0
	private ended = false

	constructor(fd = 0, read: ReadBytes = readBytes) {
		this.fd = fd
		this.readBytes = read
	}

	read(): number | null {
		if (this.position >= this.length && !this.fill()) return null
		const byte = this.chunk[this.position]
		if (byte === undefined) return null
		this.position++
		return byte
	}

	private fill(): boolean {
		if (this.ended) return false
		for (;;) {
			try {
				this.length = this.readBytes(this.fd, this.chunk)
				this.position = 0
				if (this.length === 0) this.ended = true
				return this.length > 0
			} catch (error: unknown) {
				if (isRetryable(error)) {
					pause(RETRY_DELAY_MS)
					continue
				}
				if (isNodeError(error) && error.code === 'EOF') {
					this.ended = true
					return false
				}
				throw error
			}
		}
	}
}

/**
 * Buffered byte writer over a file descriptor, stdout by default.
 * Flushes at every newline so line-oriented programs stay interactive.
 */
export class FdOutput implements OutputSink {
	private readonly fd: number
	private readonly writeBytes: WriteBytes
	private readonly pending: number[] = []

	constructor(fd = 1, write: WriteBytes = writeBytes) {
		this.fd = fd
		this.writeBytes = write
	}

	write(byte: number): void {
		this.pending.push(byte)
		if (byte === 0x0a || this.pending.length >= CHUNK_SIZE) this.flush()
	}

	flush(): void {
		let data = Buffer.from(this.pending)
		this.pending.length = 0
		while (data.length > 0) {
			try {
				const written = this.writeBytes(this.fd, data)
				data = data.subarray(written)
			} catch (error: unknown) {
				if (!isRetryable(error)) throw error
				pause(RETRY_DELAY_MS)
			}
		}
	}
}
