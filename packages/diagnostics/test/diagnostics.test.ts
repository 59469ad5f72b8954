import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	DIAGNOSTICS,
	DiagnosticSeverity,
	formatCoded,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
	TPCLI001,
	TPRUN001,
} from '../src/index.ts'

describe('diagnostics', () => {
	describe('interpolateMessage', () => {
		it('should replace known arguments', () => {
			assert.strictEqual(interpolateMessage('cell {pointer} of {size}', { pointer: -1, size: 8 }), 'cell -1 of 8')
		})

		it('should leave unknown placeholders alone', () => {
			assert.strictEqual(interpolateMessage('file {path}', { other: 'x' }), 'file {path}')
		})

		it('should return the message unchanged without arguments', () => {
			assert.strictEqual(interpolateMessage('file {path}'), 'file {path}')
		})
	})

	describe('formatCoded', () => {
		it('should prefix the code', () => {
			assert.strictEqual(formatCoded(TPCLI001, { path: 'a.b' }), '[TPCLI001] file not found: a.b')
		})

		it('should format runtime errors', () => {
			assert.strictEqual(
				formatCoded(TPRUN001, { pointer: -2 }),
				'[TPRUN001] pointer underflow: cell -2 is left of the tape start'
			)
		})
	})

	describe('catalog', () => {
		it('should key every definition by its own code', () => {
			for (const [code, def] of Object.entries(DIAGNOSTICS)) {
				assert.strictEqual(def.code, code)
			}
		})

		it('should only hold errors', () => {
			for (const def of Object.values(DIAGNOSTICS)) {
				assert.strictEqual(def.severity, DiagnosticSeverity.Error)
			}
		})

		it('should look up definitions by code', () => {
			assert.strictEqual(getDiagnostic('TPPARSE002').message, "unclosed '[': loop opened here is never closed")
		})

		it('should validate codes', () => {
			assert.strictEqual(isValidDiagnosticCode('TPRUN002'), true)
			assert.strictEqual(isValidDiagnosticCode('TPRUN999'), false)
		})
	})
})
