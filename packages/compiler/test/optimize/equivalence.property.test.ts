import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { Machine } from '../../src/exec/machine.ts'
import { execute } from '../../src/exec/execute.ts'
import { RuntimeError } from '../../src/exec/errors.ts'
import { loop, move, scanLoop } from '../../src/ir/types.ts'
import { optimize } from '../../src/optimize/index.ts'
import { mergeOperators } from '../../src/optimize/passes/merge-operators.ts'
import { balancedProgram, runnableProgram } from '../helpers/arbitraries.ts'
import { interpretReference } from '../helpers/reference.ts'
import { irOf, runIr } from '../helpers/run.ts'

const input = fc.array(fc.integer({ max: 255, min: 0 }), { maxLength: 6 })

describe('optimizer properties', () => {
	it('merging operators twice changes nothing', () => {
		fc.assert(
			fc.property(balancedProgram(), (source) => {
				const once = mergeOperators(irOf(source))
				assert.deepStrictEqual(mergeOperators(once), once)
			}),
			{ numRuns: 300 }
		)
	})

	it('the built IR behaves exactly like the reference interpreter', () => {
		fc.assert(
			fc.property(runnableProgram(), input, (source, bytes) => {
				const expected = interpretReference(source, bytes)
				const actual = runIr(irOf(source), bytes)
				fc.pre(expected.kind !== 'aborted' && actual.kind !== 'aborted')
				assert.deepStrictEqual(actual, expected)
			}),
			{ numRuns: 300 }
		)
	})

	it('optimized IR behaves like the built IR', () => {
		fc.assert(
			fc.property(runnableProgram(), input, (source, bytes) => {
				const built = irOf(source)
				const before = runIr(built, bytes)
				const after = runIr(optimize(built), bytes)
				fc.pre(before.kind !== 'aborted' && after.kind !== 'aborted')
				if (before.kind === 'ok') assert.deepStrictEqual(after, before)
				if (after.kind === 'underflow') assert.strictEqual(before.kind, 'underflow')
			}),
			{ numRuns: 300 }
		)
	})

	it('clearing odd steps keeps behaviour', () => {
		fc.assert(
			fc.property(
				fc.integer({ max: 255, min: 0 }),
				fc.integer({ max: 127, min: 1 }).map((n) => n * 2 - 1),
				(start, step) => {
					const source = `${'+'.repeat(start)}[${'-'.repeat(step)}]`
					const built = irOf(source)
					const before = runIr(built, [], 100_000)
					const after = runIr(optimize(built, { collapseOddDeltas: true }), [])
					assert.strictEqual(before.kind, 'ok')
					assert.deepStrictEqual(after, before)
				}
			),
			{ numRuns: 100 }
		)
	})

	it('a scan loop stops on the same cell as the loop it replaces', () => {
		fc.assert(
			fc.property(
				fc.array(fc.integer({ max: 2, min: 0 }), { maxLength: 24, minLength: 1 }),
				fc.nat({ max: 23 }),
				fc.integer({ max: 3, min: -3 }).filter((step) => step !== 0),
				(cells, start, step) => {
					const outcome = (program: Parameters<typeof execute>[0]): number | 'underflow' => {
						const machine = new Machine()
						cells.forEach((value, i) => machine.tape.set(i, value))
						machine.pointer = start
						try {
							return execute(program, { machine }).pointer
						} catch (error: unknown) {
							if (error instanceof RuntimeError) return 'underflow'
							throw error
						}
					}
					assert.strictEqual(outcome([scanLoop(step)]), outcome([loop([move(step)])]))
				}
			),
			{ numRuns: 300 }
		)
	})
})

describe('clear loops', () => {
	it('terminate with a zero cell for every starting value', () => {
		for (let value = 0; value < 256; value++) {
			for (const source of ['[-]', '[+]']) {
				const built = irOf(`${'+'.repeat(value)}${source}`)
				const before = runIr(built, [], 1000)
				const after = runIr(optimize(built), [])
				assert.deepStrictEqual(before, { cells: [], kind: 'ok', output: [], pointer: 0 })
				assert.deepStrictEqual(after, before)
			}
		}
	})
})
