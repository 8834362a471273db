import consola from 'consola'
import type { InteractionPort } from '../types.ts'
import { PromptCancelledError } from './errors.ts'

const YES = new Set(['y', 'Y', 'yes', 'Yes', 'YES'])

/**
 * Read a single line; null when the prompt was cancelled or input closed
 */
export type LineReader = (prompt: string) => Promise<string | null>

export async function readLineWithConsola(prompt: string): Promise<string | null> {
	const answer = await consola.prompt(prompt, { type: 'text', cancel: 'symbol' })
	if (typeof answer === 'symbol') return null
	return typeof answer === 'string' ? answer : ''
}

/**
 * Interactive port: every call waits for the operator, with no timeout
 */
export function createTerminalInteraction(readLine: LineReader = readLineWithConsola): InteractionPort {
	return {
		async confirm(prompt, defaultValue) {
			const answer = await readLine(prompt)
			if (answer === null) return false
			const trimmed = answer.trim()
			if (trimmed === '') return defaultValue
			// Anything that is not an explicit yes counts as no
			return YES.has(trimmed)
		},

		async ask(prompt, defaultValue) {
			const answer = await readLine(prompt)
			if (answer === null) throw new PromptCancelledError(prompt)
			const trimmed = answer.trim()
			return trimmed === '' ? defaultValue : trimmed
		},

		async askFreeform(prompt) {
			const answer = await readLine(prompt)
			return answer === null ? null : answer.trim()
		},
	}
}

/**
 * Non-interactive port: defaults only, stdin is never read
 */
export function createDefaultsInteraction(): InteractionPort {
	return {
		async confirm(_prompt, defaultValue) {
			return defaultValue
		},
		async ask(_prompt, defaultValue) {
			return defaultValue
		},
		async askFreeform() {
			return null
		},
	}
}

export function createInteraction(options: { useDefaults: boolean }): InteractionPort {
	return options.useDefaults ? createDefaultsInteraction() : createTerminalInteraction()
}
