/** Byte source for input nodes; null means end of input. */
export interface InputSource {
	read(): number | null
}

/** Byte sink for output nodes. */
export interface OutputSink {
	write(byte: number): void
	/** Called once when a run ends, however it ends. */
	flush?(): void
}

/** In-memory input; more bytes can be queued between runs. */
export class BufferInput implements InputSource {
	private bytes: number[]
	private position = 0

	constructor(bytes: Iterable<number> = []) {
		this.bytes = Array.from(bytes)
	}

	static fromString(text: string): BufferInput {
		return new BufferInput(Buffer.from(text, 'utf8'))
	}

	read(): number | null {
		const byte = this.bytes[this.position]
		if (byte === undefined) return null
		this.position++
		return byte
	}

	append(bytes: Iterable<number>): void {
		this.bytes = this.bytes.slice(this.position).concat(Array.from(bytes))
		this.position = 0
	}

	appendString(text: string): void {
		this.append(Buffer.from(text, 'utf8'))
	}

	clear(): void {
		this.bytes = []
		this.position = 0
	}

	/** Bytes not yet read. */
	remaining(): number {
		return this.bytes.length - this.position
	}
}

/** Collects output in memory. */
export class BufferOutput implements OutputSink {
	private readonly bytes: number[] = []

	write(byte: number): void {
		this.bytes.push(byte)
	}

	toBytes(): Uint8Array {
		return Uint8Array.from(this.bytes)
	}

	/** Output decoded as UTF-8. */
	text(): string {
		return Buffer.from(this.bytes).toString('utf8')
	}

	clear(): void {
		this.bytes.length = 0
	}
}
