import consola from 'consola'
import pc from 'picocolors'
import type { InteractionPort, TagResolution, VcsPort } from '../types.ts'

export interface ResolveTagOptions {
	vcs: VcsPort
	interaction: InteractionPort
	/** Give up after this many replacement names; unbounded when unset */
	retryLimit?: number
	/** Never prompt: a taken tag is treated as no input */
	useDefaults?: boolean
}

export function tagConflictPrompt(tag: string): string {
	return `Tag [${tag}] exists! Overwrite, keep or abort or enter a new tag (o/k/a)? [a] `
}

/**
 * Settle on a tag name for the release, asking the operator while the candidate is taken
 */
export async function resolveTag(
	candidate: string,
	options: ResolveTagOptions
): Promise<TagResolution> {
	const { vcs, interaction, retryLimit, useDefaults = false } = options
	let tag = candidate
	let renames = 0

	while (await vcs.tagExists(tag)) {
		const answer = useDefaults ? null : await interaction.askFreeform(tagConflictPrompt(tag))

		switch (answer) {
			case null:
				return { kind: 'abort', reason: 'No tag entered. Aborting release!' }

			case '':
			case 'a':
			case 'A':
				return { kind: 'abort', reason: 'Aborting release!' }

			case 'k':
			case 'K':
				consola.warn(`The current tag [${pc.cyan(tag)}] does not point to the commit for this release!`)
				return { kind: 'skip', tag }

			case 'o':
			case 'O':
				consola.warn(
					'Overwriting a tag can cause problems if others have already seen the tag (see `git help tag`)!'
				)
				return { kind: 'use', tag, overwrite: true }

			default:
				renames++
				if (retryLimit !== undefined && renames > retryLimit) {
					return {
						kind: 'abort',
						reason: `Gave up after ${retryLimit} replacement tag name${retryLimit === 1 ? '' : 's'}. Aborting release!`,
					}
				}
				tag = answer
		}
	}

	return { kind: 'use', tag, overwrite: false }
}
