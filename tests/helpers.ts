import { join } from 'node:path'
import { readVersionFile, writeVersionFile } from '../src/core/version-file.ts'
import type {
	BuildHost,
	CreateTagOptions,
	InteractionPort,
	ReleaseContext,
	TestReport,
	VcsPort,
} from '../src/types.ts'
import { getDefaultConfig } from '../src/core/config.ts'
import { VcsCommandError } from '../src/utils/errors.ts'
import { readFile } from '../src/utils/fs.ts'
import { createTerminalInteraction } from '../src/utils/prompt.ts'

export interface FakeVcsOptions {
	/** Directory staged paths are read from */
	cwd: string
	repository?: boolean
	dirty?: boolean
	upstream?: boolean
	branch?: string
	tags?: string[]
}

/**
 * In-memory git: tracks staged and committed file contents, tags and pushes
 */
export class FakeVcs implements VcsPort {
	repository: boolean
	dirty: boolean
	upstream: boolean
	branch: string
	tags = new Map<string, string>()
	commits: Array<{ hash: string; message: string }> = []
	createdTags: Array<{ name: string; options: CreateTagOptions }> = []
	pushes = 0
	tagPushes = 0
	/** Every port call, in order */
	calls: string[] = []

	private readonly cwd: string
	private staged = new Map<string, string>()
	private committed = new Map<string, string>()

	constructor(options: FakeVcsOptions) {
		this.cwd = options.cwd
		this.repository = options.repository ?? true
		this.dirty = options.dirty ?? false
		this.upstream = options.upstream ?? false
		this.branch = options.branch ?? 'main'
		for (const tag of options.tags ?? []) this.tags.set(tag, 'old0000')
	}

	async isRepository() {
		this.calls.push('isRepository')
		return this.repository
	}

	async isDirty() {
		this.calls.push('isDirty')
		return this.dirty || (await this.status()) !== ''
	}

	async currentHash() {
		return this.commits.at(-1)?.hash ?? 'base000'
	}

	async currentBranch() {
		return this.branch
	}

	async stage(path: string) {
		this.calls.push(`stage ${path}`)
		this.staged.set(path, readFile(join(this.cwd, path)) ?? '')
	}

	async status() {
		return [...this.staged]
			.filter(([path, content]) => this.committed.get(path) !== content)
			.map(([path]) => `M  ${path}`)
			.join('\n')
	}

	async commit(message: string) {
		this.calls.push(`commit ${message}`)
		if ((await this.status()) === '') {
			throw new VcsCommandError(`git commit -m ${message}`, 1, 'nothing to commit, working tree clean')
		}
		for (const [path, content] of this.staged) this.committed.set(path, content)
		const hash = `hash${String(this.commits.length + 1).padStart(3, '0')}`
		this.commits.push({ hash, message })
	}

	async tagExists(name: string) {
		this.calls.push(`tagExists ${name}`)
		return this.tags.has(name)
	}

	async createTag(name: string, options: CreateTagOptions = {}) {
		this.calls.push(`createTag ${name}`)
		if (this.tags.has(name) && !options.force) {
			throw new VcsCommandError(`git tag ${name}`, 128, `fatal: tag '${name}' already exists`)
		}
		this.tags.set(name, await this.currentHash())
		this.createdTags.push({ name, options })
	}

	async hasUpstream() {
		return this.upstream
	}

	async push() {
		this.calls.push('push')
		this.pushes++
	}

	async pushTags() {
		this.calls.push('pushTags')
		this.tagPushes++
	}
}

export interface ScriptedInteraction extends InteractionPort {
	/** Prompts shown so far */
	prompts: string[]
}

/**
 * Terminal semantics over a fixed list of typed lines (null = input closed)
 */
export function scriptedInteraction(answers: Array<string | null>): ScriptedInteraction {
	const queue = [...answers]
	const prompts: string[] = []
	const port = createTerminalInteraction(async (prompt) => {
		prompts.push(prompt)
		if (queue.length === 0) {
			throw new Error(`Unexpected prompt: ${prompt}`)
		}
		return queue.shift() ?? null
	})
	return { ...port, prompts }
}

/**
 * Any prompt fails the test
 */
export function silentInteraction(): InteractionPort {
	return createTerminalInteraction(async (prompt) => {
		throw new Error(`Unexpected prompt: ${prompt}`)
	})
}

export interface FakeHostOptions {
	dir: string
	versionFile?: string
	snapshotDependencies?: string[] | Error
	testsPass?: boolean
}

/**
 * BuildHost writing a real version file, with canned dependency and test results
 */
export class FakeHost implements BuildHost {
	readonly versionFile: string
	testRuns = 0
	private readonly dir: string
	private readonly deps: string[] | Error
	private readonly testsPass: boolean

	constructor(options: FakeHostOptions) {
		this.dir = options.dir
		this.versionFile = options.versionFile ?? 'version.conf'
		this.deps = options.snapshotDependencies ?? []
		this.testsPass = options.testsPass ?? true
	}

	get versionPath(): string {
		return join(this.dir, this.versionFile)
	}

	readVersion() {
		return readVersionFile(this.versionPath)
	}

	writeVersion(version: string) {
		writeVersionFile(this.versionPath, version)
	}

	async snapshotDependencies() {
		if (this.deps instanceof Error) throw this.deps
		return this.deps
	}

	async runTests(): Promise<TestReport> {
		this.testRuns++
		return this.testsPass ? { success: true, exitCode: 0 } : { success: false, exitCode: 1 }
	}
}

export function createContext(parts: {
	vcs: VcsPort
	host: BuildHost
	interaction: InteractionPort
}): ReleaseContext {
	return { config: getDefaultConfig(), ...parts }
}
