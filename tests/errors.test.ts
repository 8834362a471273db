import { describe, expect, it } from 'vitest'
import {
	ConfigError,
	formatError,
	GitError,
	PromptCancelledError,
	ReleaseError,
	VcsCommandError,
} from '../src/utils/errors.ts'

describe('errors', () => {
	it('should prefix the code', () => {
		expect(formatError(new GitError('Not a git repository'))).toBe('[GIT_ERROR] Not a git repository')
	})

	it('should append the suggestion', () => {
		expect(formatError(new ConfigError('Bad config', 'Check the file'))).toBe(
			'[CONFIG_ERROR] Bad config\n\n💡 Check the file'
		)
	})

	it('should describe failed git commands', () => {
		const error = new VcsCommandError('git push origin main', 1, 'rejected\n')

		expect(error).toBeInstanceOf(ReleaseError)
		expect(formatError(error)).toBe(
			'[VCS_COMMAND_ERROR] `git push origin main` failed with exit code 1: rejected\n\n💡 Fix the repository state and re-run the remaining steps'
		)
	})

	it('should omit empty stderr', () => {
		expect(new VcsCommandError('git tag v1', 128, '  ').message).toBe('`git tag v1` failed with exit code 128')
	})

	it('should name the cancelled prompt', () => {
		expect(new PromptCancelledError('Next version [1.0.1] : ').message).toBe(
			'No input provided for "Next version [1.0.1] :"'
		)
	})

	it('should format plain errors and values', () => {
		expect(formatError(new Error('boom'))).toBe('boom')
		expect(formatError('boom')).toBe('boom')
	})
})
