import consola from 'consola'
import pc from 'picocolors'
import { createNodeHost } from '../core/host.ts'
import { getStep, defaultReleaseSteps } from '../core/steps.ts'
import { createReleaseState } from '../core/state.ts'
import { loadConfig, resolveLineSeparator } from '../core/config.ts'
import { runPipeline } from '../core/pipeline.ts'
import { formatVersion, parseVersion } from '../core/version.ts'
import type {
	BuildHost,
	InteractionPort,
	PipelineResult,
	ReleaseContext,
	ReleaseState,
	VcsPort,
	Versions,
} from '../types.ts'
import { ConfigError, ValidationError } from '../utils/errors.ts'
import { createGitVcs } from '../utils/git.ts'
import { createInteraction } from '../utils/prompt.ts'

export interface ReleaseOptions {
	cwd?: string
	/** Accept every default, never prompt */
	useDefaults?: boolean
	skipTests?: boolean
	/** Resume the release at this step */
	from?: string
	/** Seed the chosen versions (both or neither) */
	releaseVersion?: string
	nextVersion?: string
	verbose?: boolean
	/** Collaborator overrides, mainly for tests and embedding */
	vcs?: VcsPort
	interaction?: InteractionPort
	host?: BuildHost
}

export interface PreparedRelease {
	ctx: ReleaseContext
	initial: ReleaseState
}

function seededVersions(options: ReleaseOptions): Versions | undefined {
	const { releaseVersion, nextVersion } = options
	if (releaseVersion === undefined && nextVersion === undefined) return undefined
	if (releaseVersion === undefined || nextVersion === undefined) {
		throw new ValidationError(
			'--release-version and --next-version must be given together',
			'Pass both, or run release-inquire-versions first'
		)
	}
	return { release: seededVersion(releaseVersion), next: seededVersion(nextVersion) }
}

function seededVersion(input: string): string {
	const parsed = parseVersion(input)
	if (!parsed.ok) {
		throw new ValidationError(parsed.error, 'Use e.g. 1.2.0 and 1.2.1-SNAPSHOT')
	}
	return formatVersion(parsed.version)
}

/**
 * Load config, wire the collaborators and build the initial state
 */
export async function prepareRelease(options: ReleaseOptions = {}): Promise<PreparedRelease> {
	const cwd = options.cwd ?? process.cwd()
	resolveLineSeparator()

	if (options.verbose) {
		consola.level = 4
	}

	const config = await loadConfig(cwd)
	const useDefaults = options.useDefaults ?? false

	if (options.verbose) {
		consola.debug(
			'Options:',
			JSON.stringify({ useDefaults, skipTests: options.skipTests, from: options.from }, null, 2)
		)
		consola.debug('Config:', JSON.stringify(config, null, 2))
		consola.debug('Working directory:', cwd)
	}

	const host = options.host ?? createNodeHost({ cwd, config })
	const version = host.readVersion()
	if (version === null) {
		throw new ConfigError(
			`No version found in ${config.versionFile} or package.json`,
			`Run ${pc.cyan('release-steps init')} to create ${config.versionFile}`
		)
	}

	const ctx: ReleaseContext = {
		config,
		host,
		vcs: options.vcs ?? createGitVcs({ cwd }),
		interaction: options.interaction ?? createInteraction({ useDefaults }),
	}

	const initial = createReleaseState({
		version,
		useDefaults,
		skipTests: options.skipTests ?? false,
		versions: seededVersions(options),
	})

	return { ctx, initial }
}

/**
 * Run the full release process
 */
export async function runRelease(options: ReleaseOptions = {}): Promise<PipelineResult> {
	const { ctx, initial } = await prepareRelease(options)
	consola.info(`Releasing from ${pc.bold(initial.version)}`)
	return runPipeline(defaultReleaseSteps, initial, ctx, { from: options.from })
}

/**
 * Run a single release step against the ambient state
 */
export async function runStep(name: string, options: ReleaseOptions = {}): Promise<PipelineResult> {
	const step = getStep(name)
	if (!step) {
		throw new ValidationError(
			`Unknown step: ${name}`,
			`Available steps: ${defaultReleaseSteps.map((s) => s.name).join(', ')}`
		)
	}
	const { ctx, initial } = await prepareRelease(options)
	return runPipeline([step], initial, ctx)
}
