import { $ } from 'zx'
import type { CreateTagOptions, VcsPort } from '../types.ts'
import { GitError, VcsCommandError } from './errors.ts'

export interface GitResult {
	exitCode: number
	stdout: string
	stderr: string
}

/** Runs `git <args>` and reports the outcome without throwing */
export type GitExec = (args: string[]) => Promise<GitResult>

export interface GitVcsOptions {
	cwd?: string
	/** Override the git runner (tests) */
	exec?: GitExec
}

/**
 * Run git through zx in the given directory
 */
export function shellGit(cwd: string): GitExec {
	const sh = $({ cwd, quiet: true, nothrow: true })
	return async (args) => {
		const output = await sh`git ${args}`
		return {
			exitCode: output.exitCode ?? 1,
			stdout: output.stdout,
			stderr: output.stderr,
		}
	}
}

/**
 * Git-backed VcsPort
 */
export function createGitVcs(options: GitVcsOptions = {}): VcsPort {
	const exec = options.exec ?? shellGit(options.cwd ?? process.cwd())

	// Commands that must succeed
	async function git(...args: string[]): Promise<string> {
		const result = await exec(args)
		if (result.exitCode !== 0) {
			throw new VcsCommandError(`git ${args.join(' ')}`, result.exitCode, result.stderr)
		}
		return result.stdout
	}

	// Commands whose exit code is the answer
	async function succeeds(...args: string[]): Promise<boolean> {
		const result = await exec(args)
		return result.exitCode === 0
	}

	async function currentBranch(): Promise<string> {
		return (await git('rev-parse', '--abbrev-ref', 'HEAD')).trim()
	}

	async function trackingRemote(): Promise<string> {
		const branch = await currentBranch()
		const result = await exec(['config', '--get', `branch.${branch}.remote`])
		const remote = result.stdout.trim()
		return result.exitCode === 0 && remote ? remote : 'origin'
	}

	async function status(): Promise<string> {
		return (await git('status', '--porcelain')).trim()
	}

	return {
		async isRepository() {
			const result = await exec(['rev-parse', '--is-inside-work-tree'])
			return result.exitCode === 0 && result.stdout.trim() === 'true'
		},

		async isDirty() {
			return (await status()) !== ''
		},

		async currentHash() {
			return (await git('rev-parse', 'HEAD')).trim()
		},

		currentBranch,

		async stage(path: string) {
			await git('add', '--', path)
		},

		status,

		async commit(message: string) {
			await git('commit', '-m', message)
		},

		async tagExists(name: string) {
			return succeeds('rev-parse', '--quiet', '--verify', `refs/tags/${name}`)
		},

		async createTag(name: string, tagOptions: CreateTagOptions = {}) {
			const args = ['tag']
			if (tagOptions.force) args.push('--force')
			if (tagOptions.message) args.push('-a', name, '-m', tagOptions.message)
			else args.push(name)
			await git(...args)
		},

		async hasUpstream() {
			return succeeds('rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{upstream}')
		},

		async push() {
			const [remote, branch] = await Promise.all([trackingRemote(), currentBranch()])
			if (branch === 'HEAD') {
				throw new GitError('Cannot push from a detached HEAD', 'Check out the release branch first')
			}
			await git('push', remote, branch)
		},

		async pushTags() {
			await git('push', '--tags', await trackingRemote())
		},
	}
}
