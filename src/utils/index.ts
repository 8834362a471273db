export { readPackageJson, fileExists, readFile, writeFile, writeFileAtomic } from './fs.ts'
export { createGitVcs, shellGit, type GitExec, type GitResult, type GitVcsOptions } from './git.ts'
export {
	createInteraction,
	createTerminalInteraction,
	createDefaultsInteraction,
	readLineWithConsola,
	type LineReader,
} from './prompt.ts'
export {
	ReleaseError,
	GitError,
	VcsCommandError,
	ConfigError,
	ValidationError,
	PromptCancelledError,
	formatError,
} from './errors.ts'
