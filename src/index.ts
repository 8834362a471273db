// Types
export type {
	ReleaseConfig,
	ResolvedReleaseConfig,
	ReleaseState,
	Versions,
	Step,
	StepOutcome,
	TagResolution,
	VcsPort,
	InteractionPort,
	BuildHost,
	TestReport,
	ReleaseContext,
	PipelineResult,
	CreateTagOptions,
} from './types.ts'

// Core functionality
export * from './core/index.ts'

// Ports
export {
	createGitVcs,
	shellGit,
	createInteraction,
	createTerminalInteraction,
	createDefaultsInteraction,
	type GitExec,
	type GitResult,
	type LineReader,
} from './utils/index.ts'

// Errors
export {
	ReleaseError,
	GitError,
	VcsCommandError,
	ConfigError,
	ValidationError,
	PromptCancelledError,
	formatError,
} from './utils/errors.ts'

// Commands (for programmatic use)
export { runRelease, runStep, prepareRelease, type ReleaseOptions } from './commands/release.ts'
export { runInit, type InitOptions } from './commands/init.ts'
export { runStatus, type StatusOptions, type StatusReport } from './commands/status.ts'
