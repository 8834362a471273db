/**
 * Base error class for release errors
 */
export class ReleaseError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly suggestion?: string
	) {
		super(message)
		this.name = 'ReleaseError'
	}
}

/**
 * Git-related errors
 */
export class GitError extends ReleaseError {
	constructor(message: string, suggestion?: string) {
		super(message, 'GIT_ERROR', suggestion)
		this.name = 'GitError'
	}
}

/**
 * A git command exited non-zero
 */
export class VcsCommandError extends ReleaseError {
	constructor(
		public readonly command: string,
		public readonly exitCode: number,
		public readonly stderr: string
	) {
		super(
			`\`${command}\` failed with exit code ${exitCode}${stderr.trim() ? `: ${stderr.trim()}` : ''}`,
			'VCS_COMMAND_ERROR',
			'Fix the repository state and re-run the remaining steps'
		)
		this.name = 'VcsCommandError'
	}
}

/**
 * Configuration errors
 */
export class ConfigError extends ReleaseError {
	constructor(message: string, suggestion?: string) {
		super(message, 'CONFIG_ERROR', suggestion)
		this.name = 'ConfigError'
	}
}

/**
 * Validation errors (invalid input, missing requirements)
 */
export class ValidationError extends ReleaseError {
	constructor(message: string, suggestion?: string) {
		super(message, 'VALIDATION_ERROR', suggestion)
		this.name = 'ValidationError'
	}
}

/**
 * The operator closed or cancelled a prompt
 */
export class PromptCancelledError extends ReleaseError {
	constructor(prompt: string) {
		super(`No input provided for "${prompt.trim()}"`, 'PROMPT_CANCELLED')
		this.name = 'PromptCancelledError'
	}
}

/**
 * Format error message with suggestion
 */
export function formatError(error: unknown): string {
	if (error instanceof ReleaseError) {
		let message = `[${error.code}] ${error.message}`
		if (error.suggestion) {
			message += `\n\n💡 ${error.suggestion}`
		}
		return message
	}

	if (error instanceof Error) {
		return error.message
	}

	return String(error)
}
