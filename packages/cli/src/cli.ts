#!/usr/bin/env node

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import InspectCommand from './commands/inspect.ts'
import ReplCommand from './commands/repl.ts'
import RunCommand from './commands/run.ts'

const version = '0.1.0'

const USAGE = [
	`Tapeworm v${version}`,
	'',
	'Usage: tapeworm <run|inspect|repl> [options]',
	'',
	'Run "tapeworm --help" for available commands and options.',
].join('\n')

function createKernel(): ReturnType<typeof Kernel.create> {
	const kernel = Kernel.create()
	kernel.info.set('binary', 'tapeworm')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})
	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})
	kernel.on('version', async () => {
		console.log(version)
		return true
	})

	kernel.addLoader(new ListLoader([RunCommand, InspectCommand, ReplCommand, HelpCommand]))
	return kernel
}

async function main(argv: string[]): Promise<void> {
	if (argv.length === 0) {
		console.log(USAGE)
		return
	}
	const kernel = createKernel()
	await kernel.handle(argv)
	process.exitCode = kernel.exitCode ?? 0
}

main(process.argv.slice(2)).catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
