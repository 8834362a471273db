import consola from 'consola'
import pc from 'picocolors'
import type { ReleaseContext, ReleaseState, Step, Versions } from '../types.ts'
import { formatError } from '../utils/errors.ts'
import { abort, proceed } from './pipeline.ts'
import { getVersions, withMetadata, withVersion, withVersions } from './state.ts'
import { resolveTag } from './tag.ts'
import {
	compareVersions,
	formatTagName,
	formatVersion,
	parseVersion,
	type Version,
	proposeNext,
	proposeRelease,
} from './version.ts'

const MISSING_VERSIONS =
	'No versions are set! Was this release step executed before release-inquire-versions?'

function renderMessage(template: string, version: string): string {
	return template.replaceAll('{version}', version)
}

/**
 * Abort unless we are in a clean git working tree
 */
export const checkGit: Step = {
	name: 'release-git-checks',
	async run(state, { vcs }) {
		if (!(await vcs.isRepository())) {
			return abort('Aborting release. Working directory is not a git repository.')
		}
		if (await vcs.isDirty()) {
			return abort('Aborting release. Working directory is dirty.')
		}
		consola.info(`Starting release process off git commit: ${pc.cyan(await vcs.currentHash())}`)
		return proceed(state)
	},
}

export const checkSnapshotDependencies: Step = {
	name: 'release-check-snapshot-dependencies',
	async run(state, { host, interaction }) {
		let snapshotDeps: string[]
		try {
			snapshotDeps = await host.snapshotDependencies()
		} catch (error) {
			return abort(`Error checking for snapshot dependencies: ${formatError(error)}`)
		}

		if (snapshotDeps.length === 0) return proceed(state)

		if (state.useDefaults) {
			return abort('Aborting release due to snapshot dependencies.')
		}

		consola.warn(`Snapshot dependencies detected:\n${snapshotDeps.join('\n')}`)
		const proceedAnyway = await interaction.confirm('Do you want to continue (y/n)? [n] ', false)
		return proceedAnyway ? proceed(state) : abort('Aborting release due to snapshot dependencies.')
	},
}

async function readVersion(
	ctx: ReleaseContext,
	state: ReleaseState,
	suggested: Version,
	label: string
): Promise<{ ok: true; version: Version } | { ok: false; error: string }> {
	if (state.useDefaults) return { ok: true, version: suggested }

	const suggestion = formatVersion(suggested)
	const input = await ctx.interaction.ask(`${label} [${suggestion}] : `, suggestion)
	return parseVersion(input)
}

export const inquireVersions: Step = {
	name: 'release-inquire-versions',
	async run(state, ctx) {
		const current = parseVersion(state.version)
		if (!current.ok) return abort(current.error)

		const release = await readVersion(ctx, state, proposeRelease(current.version), 'Release version')
		if (!release.ok) return abort(release.error)

		const next = await readVersion(
			ctx,
			state,
			proposeNext(release.version, ctx.config.snapshotQualifier),
			'Next version'
		)
		if (!next.ok) return abort(next.error)

		const versions: Versions = {
			release: formatVersion(release.version),
			next: formatVersion(next.version),
		}
		if (compareVersions(next.version, release.version) <= 0) {
			consola.warn(
				`Next version ${pc.yellow(versions.next)} is not ahead of release version ${pc.yellow(versions.release)}`
			)
		}

		consola.info(`Release ${pc.green(versions.release)}, next ${pc.dim(versions.next)}`)
		return proceed(withVersions(state, versions))
	},
}

export const runTests: Step = {
	name: 'release-run-tests',
	async run(state, { host }) {
		if (state.skipTests) {
			consola.info('Skipping tests')
			return proceed(state)
		}
		const report = await host.runTests()
		if (!report.success) {
			return abort(`Tests failed (exit code ${report.exitCode}). Aborting release.`)
		}
		return proceed(state)
	},
}

function setVersion(name: string, select: (versions: Readonly<Versions>) => string): Step {
	return {
		name,
		async run(state, { host }) {
			const versions = getVersions(state)
			if (!versions) return abort(MISSING_VERSIONS)

			const selected = select(versions)
			consola.info(`Setting version to '${pc.green(selected)}'.`)

			// Written first: if this throws, the in-memory version is untouched
			host.writeVersion(selected)
			return proceed(withVersion(state, selected))
		},
	}
}

export const setReleaseVersion = setVersion('release-set-release-version', (v) => v.release)
export const setNextVersion = setVersion('release-set-next-version', (v) => v.next)

/**
 * Stage the version file and commit it; a no-op when the file did not change
 */
async function commitVersion(
	state: ReleaseState,
	ctx: ReleaseContext,
	template: string
): Promise<void> {
	const { vcs, host } = ctx
	await vcs.stage(host.versionFile)

	if ((await vcs.status()) === '') {
		consola.info('Nothing to commit, version file is unchanged')
		return
	}

	await vcs.commit(renderMessage(template, state.version))
}

export const commitReleaseVersion: Step = {
	name: 'release-commit-release-version',
	async run(state, ctx) {
		await commitVersion(state, ctx, ctx.config.commitMessages.release)
		const hash = await ctx.vcs.currentHash()
		return proceed(withMetadata(state, { releaseHash: hash }))
	},
}

export const commitNextVersion: Step = {
	name: 'release-commit-next-version',
	async run(state, ctx) {
		await commitVersion(state, ctx, ctx.config.commitMessages.next)
		return proceed(state)
	},
}

export const tagRelease: Step = {
	name: 'release-tag-release',
	async run(state, { vcs, interaction, config }) {
		const resolution = await resolveTag(formatTagName(state.version, config.tagPrefix), {
			vcs,
			interaction,
			retryLimit: config.tagRetryLimit,
			useDefaults: state.useDefaults,
		})

		switch (resolution.kind) {
			case 'abort':
				return abort(resolution.reason)
			case 'skip':
				return proceed(state)
			case 'use':
				await vcs.createTag(resolution.tag, {
					force: true,
					message: `Releasing ${resolution.tag}`,
				})
				consola.info(`Tagged ${pc.cyan(resolution.tag)}`)
				return proceed(withMetadata(state, { releaseTag: resolution.tag }))
		}
	},
}

export const pushChanges: Step = {
	name: 'release-push-changes',
	async run(state, { vcs, interaction }) {
		if (!(await vcs.hasUpstream())) {
			consola.info(
				`Changes were NOT pushed, because no upstream branch is configured for the local branch [${await vcs.currentBranch()}]`
			)
			return proceed(state)
		}

		const push =
			state.useDefaults ||
			(await interaction.confirm('Push changes to the remote repository (y/n)? [y] ', true))
		if (push) {
			await vcs.push()
			await vcs.pushTags()
			consola.success('Pushed branch and tags')
		} else {
			consola.warn('Remember to push the changes yourself!')
		}
		return proceed(state)
	},
}

/**
 * Full release, in order
 */
export const defaultReleaseSteps: readonly Step[] = [
	checkGit,
	checkSnapshotDependencies,
	inquireVersions,
	runTests,
	setReleaseVersion,
	commitReleaseVersion,
	tagRelease,
	setNextVersion,
	commitNextVersion,
	pushChanges,
]

export function getStep(name: string): Step | undefined {
	return defaultReleaseSteps.find((step) => step.name === name)
}
