#!/usr/bin/env -S node --import tsx
import { defineCommand, runMain } from 'citty'
import consola from 'consola'
import pc from 'picocolors'
import pkg from '../package.json'
import { runInit } from './commands/init.ts'
import { runRelease, runStep, type ReleaseOptions } from './commands/release.ts'
import { runStatus } from './commands/status.ts'
import { defaultReleaseSteps } from './core/steps.ts'
import type { PipelineResult } from './types.ts'

const sharedArgs = {
	'with-defaults': {
		type: 'boolean',
		description: 'Accept every default answer, never prompt',
	},
	'skip-tests': {
		type: 'boolean',
		description: 'Skip the test step',
	},
	verbose: {
		type: 'boolean',
		description: 'Enable debug output',
		alias: 'v',
	},
} as const

const versionArgs = {
	'release-version': {
		type: 'string',
		description: 'Release version, when release-inquire-versions is not part of this run',
	},
	'next-version': {
		type: 'string',
		description: 'Next development version, used with --release-version',
	},
} as const

// Only the outermost layer turns an abort into an exit status
function exitOnAbort(result: PipelineResult): void {
	if (result.status === 'aborted') {
		consola.error(`Release aborted at ${pc.bold(result.failedStep)}: ${result.reason}`)
		if (result.completedSteps.length > 0) {
			consola.info(
				`Completed before the abort: ${result.completedSteps.join(', ')}\nResume with ${pc.cyan(`--from=${result.failedStep}`)}`
			)
		}
		process.exit(1)
	}
}

function stepCommand(name: string) {
	return defineCommand({
		meta: {
			name,
			description: `Run only the ${name} step`,
		},
		args: { ...sharedArgs, ...versionArgs },
		run: async ({ args }) => {
			const options: ReleaseOptions = {
				useDefaults: Boolean(args['with-defaults']),
				skipTests: Boolean(args['skip-tests']),
				verbose: Boolean(args.verbose),
				releaseVersion: args['release-version'],
				nextVersion: args['next-version'],
			}
			exitOnAbort(await runStep(name, options))
		},
	})
}

const release = defineCommand({
	meta: {
		name: 'release-steps',
		version: pkg.version,
		description: pkg.description,
	},
	args: {
		...sharedArgs,
		from: {
			type: 'string',
			description: 'Resume the release at this step (--from=<step>)',
		},
	},
	subCommands: {
		...Object.fromEntries(defaultReleaseSteps.map((step) => [step.name, stepCommand(step.name)])),
		status: defineCommand({
			meta: {
				name: 'status',
				description: 'Show repository state and proposed versions',
			},
			run: async () => {
				await runStatus()
			},
		}),
		init: defineCommand({
			meta: {
				name: 'init',
				description: 'Create a config file and version file',
			},
			args: {
				format: {
					type: 'string',
					description: 'Config format: ts or json',
					default: 'ts',
				},
				force: {
					type: 'boolean',
					description: 'Overwrite existing files',
					alias: 'f',
				},
				version: {
					type: 'string',
					description: 'Initial version (e.g. 1.0.0-SNAPSHOT)',
				},
			} as const,
			run: async ({ args }) => {
				await runInit({
					format: args.format === 'json' ? 'json' : 'ts',
					force: Boolean(args.force),
					version: args.version,
				})
			},
		}),
	},
	run: async ({ args, rawArgs }) => {
		// citty also calls the parent's run after a subcommand
		const first = rawArgs.find((arg) => !arg.startsWith('-'))
		if (first !== undefined && (first === 'status' || first === 'init' || first.startsWith('release-'))) {
			return
		}
		exitOnAbort(
			await runRelease({
				useDefaults: Boolean(args['with-defaults']),
				skipTests: Boolean(args['skip-tests']),
				verbose: Boolean(args.verbose),
				from: args.from,
			})
		)
	},
})

void runMain(release)
