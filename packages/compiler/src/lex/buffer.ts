import { TokenKind, tokenKindOf } from '../core/tokens.ts'

/**
 * Collects interactive input line by line until it forms a unit worth
 * compiling: every `[` closed, or a stray `]` seen.
 */
export class SourceBuffer {
	private readonly lines: string[] = []
	private openLoops = 0
	private strayClose = false

	append(line: string): void {
		this.lines.push(line)
		for (const char of line) {
			const kind = tokenKindOf(char)
			if (kind === TokenKind.LoopOpen) {
				this.openLoops++
			} else if (kind === TokenKind.LoopClose) {
				if (this.openLoops === 0) {
					this.strayClose = true
				} else {
					this.openLoops--
				}
			}
		}
	}

	/** Number of loops still open. */
	depth(): number {
		return this.openLoops
	}

	isEmpty(): boolean {
		return this.lines.length === 0
	}

	isComplete(): boolean {
		return this.openLoops === 0 || this.strayClose
	}

	/** Returns the pending text and starts over. */
	take(): string {
		const text = this.lines.join('\n')
		this.clear()
		return text
	}

	clear(): void {
		this.lines.length = 0
		this.openLoops = 0
		this.strayClose = false
	}
}
