export interface ReleaseConfig {
	/** Version declaration file, relative to the working directory */
	versionFile?: string

	/** Left-hand side of the declaration, e.g. `version` in `version := "1.0.0"` */
	versionKey?: string

	/** Qualifier appended to development versions */
	snapshotQualifier?: string

	/** Prefix for release tags (v1.0.0) */
	tagPrefix?: string

	/** Commit message templates, `{version}` is replaced */
	commitMessages?: {
		release?: string
		next?: string
	}

	/** Command (argv) run by the test step */
	testCommand?: string[]

	/**
	 * Maximum number of replacement tag names accepted when a tag already exists.
	 * Unset means the operator may keep trying.
	 */
	tagRetryLimit?: number
}

export interface ResolvedReleaseConfig {
	versionFile: string
	versionKey: string
	snapshotQualifier: string
	tagPrefix: string
	commitMessages: {
		release: string
		next: string
	}
	testCommand: string[]
	tagRetryLimit?: number
}

export interface Versions {
	release: string
	next: string
}

export interface ReleaseState {
	/** Answer every prompt with its default, never read from the terminal */
	readonly useDefaults: boolean
	readonly skipTests: boolean
	/** Current build version */
	readonly version: string
	/** Chosen by the version inquiry step */
	readonly versions?: Readonly<Versions>
	/** Build metadata recorded along the way (release hash, release tag) */
	readonly metadata: Readonly<Record<string, string>>
}

export type StepOutcome =
	| { kind: 'continue'; state: ReleaseState }
	| { kind: 'abort'; reason: string }

export interface Step {
	name: string
	run: (state: ReleaseState, ctx: ReleaseContext) => Promise<StepOutcome>
}

export type TagResolution =
	| { kind: 'use'; tag: string; overwrite: boolean }
	| { kind: 'skip'; tag: string }
	| { kind: 'abort'; reason: string }

export interface CreateTagOptions {
	force?: boolean
	message?: string
}

export interface VcsPort {
	isRepository(): Promise<boolean>
	isDirty(): Promise<boolean>
	currentHash(): Promise<string>
	currentBranch(): Promise<string>
	stage(path: string): Promise<void>
	status(): Promise<string>
	commit(message: string): Promise<void>
	tagExists(name: string): Promise<boolean>
	createTag(name: string, options?: CreateTagOptions): Promise<void>
	hasUpstream(): Promise<boolean>
	push(): Promise<void>
	pushTags(): Promise<void>
}

export interface InteractionPort {
	confirm(prompt: string, defaultValue: boolean): Promise<boolean>
	ask(prompt: string, defaultValue: string): Promise<string>
	/** Resolves to null when no input could be read */
	askFreeform(prompt: string): Promise<string | null>
}

export interface TestReport {
	success: boolean
	exitCode: number
}

export interface BuildHost {
	/** Version artifact path, as passed to the VCS */
	readonly versionFile: string
	readVersion(): string | null
	writeVersion(version: string): void
	snapshotDependencies(): Promise<string[]>
	runTests(): Promise<TestReport>
}

export interface ReleaseContext {
	config: ResolvedReleaseConfig
	vcs: VcsPort
	interaction: InteractionPort
	host: BuildHost
}

export type PipelineResult =
	| { status: 'completed'; state: ReleaseState; completedSteps: string[] }
	| {
			status: 'aborted'
			reason: string
			failedStep: string
			completedSteps: string[]
			/** Last state produced before the abort */
			state: ReleaseState
	  }
