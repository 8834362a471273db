import consola from 'consola'
import pc from 'picocolors'
import { loadConfig } from '../core/config.ts'
import { createNodeHost } from '../core/host.ts'
import { formatTagName, suggestNextVersion, suggestReleaseVersion } from '../core/version.ts'
import type { BuildHost, VcsPort } from '../types.ts'
import { createGitVcs } from '../utils/git.ts'

export interface StatusOptions {
	cwd?: string
	vcs?: VcsPort
	host?: BuildHost
}

export interface StatusReport {
	repository: boolean
	branch: string | null
	clean: boolean | null
	upstream: boolean | null
	version: string | null
	proposedRelease: string | null
	proposedNext: string | null
	tag: string | null
	tagExists: boolean | null
	snapshotDependencies: string[]
}

type GitStatus = [
	branch: string | null,
	clean: boolean | null,
	upstream: boolean | null,
	tagExists: boolean | null,
]

export async function runStatus(options: StatusOptions = {}): Promise<StatusReport> {
	const cwd = options.cwd ?? process.cwd()
	const config = await loadConfig(cwd)
	const vcs = options.vcs ?? createGitVcs({ cwd })
	const host = options.host ?? createNodeHost({ cwd, config })

	const version = host.readVersion()
	const proposedRelease = version !== null ? suggestReleaseVersion(version) : null
	const proposedNext =
		proposedRelease !== null ? suggestNextVersion(proposedRelease, config.snapshotQualifier) : null
	const tag = proposedRelease !== null ? formatTagName(proposedRelease, config.tagPrefix) : null
	const snapshotDependencies = await host.snapshotDependencies()

	const repository = await vcs.isRepository()
	const gitStatus: GitStatus = repository
		? await Promise.all([
				vcs.currentBranch(),
				vcs.isDirty().then((dirty) => !dirty),
				vcs.hasUpstream(),
				tag !== null ? vcs.tagExists(tag) : Promise.resolve(null),
			])
		: [null, null, null, null]
	const [branch, clean, upstream, tagExists] = gitStatus

	consola.info(`${pc.bold('Current Status')}\n`)

	if (!repository) {
		console.log(`  ${pc.yellow('Not a git repository')}`)
	} else {
		console.log(`  ${pc.dim('Branch:')} ${pc.cyan(branch ?? '')}`)
		console.log(`  ${pc.dim('Clean:')} ${clean ? pc.green('yes') : pc.yellow('no')}`)
		console.log(`  ${pc.dim('Upstream:')} ${upstream ? pc.green('yes') : pc.yellow('none')}`)
	}
	console.log()

	console.log(`  ${pc.dim('Version:')} ${version ?? pc.dim('unknown')}`)
	if (proposedRelease && proposedNext) {
		console.log(`  ${pc.dim('Release:')} ${pc.green(proposedRelease)}`)
		console.log(`  ${pc.dim('Next:')} ${proposedNext}`)
	}
	if (tag) {
		console.log(`  ${pc.dim('Tag:')} ${pc.cyan(tag)}${tagExists ? pc.yellow(' (exists)') : ''}`)
	}
	console.log()

	if (snapshotDependencies.length > 0) {
		console.log(`${pc.bold('Snapshot dependencies:')}\n`)
		for (const dep of snapshotDependencies) {
			console.log(`  ${pc.yellow(dep)}`)
		}
		console.log()
	}

	return {
		repository,
		branch,
		clean,
		upstream,
		version,
		proposedRelease,
		proposedNext,
		tag,
		tagExists,
		snapshotDependencies,
	}
}
