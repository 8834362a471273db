import consola from 'consola'
import pc from 'picocolors'
import type { PipelineResult, ReleaseContext, ReleaseState, Step, StepOutcome } from '../types.ts'
import { ValidationError, formatError } from '../utils/errors.ts'

export function proceed(state: ReleaseState): StepOutcome {
	return { kind: 'continue', state }
}

export function abort(reason: string): StepOutcome {
	return { kind: 'abort', reason }
}

export interface RunPipelineOptions {
	/** Resume at this step, skipping the ones before it */
	from?: string
}

/**
 * Pick the steps to run when resuming from a named step
 */
export function selectSteps(steps: readonly Step[], from?: string): Step[] {
	if (!from) return [...steps]
	const index = steps.findIndex((step) => step.name === from)
	if (index === -1) {
		throw new ValidationError(
			`Unknown step: ${from}`,
			`Available steps: ${steps.map((s) => s.name).join(', ')}`
		)
	}
	return steps.slice(index)
}

/**
 * Run steps in order, threading the state through.
 *
 * The first abort stops the run. Side effects of completed steps stay in place;
 * re-run the remaining steps with `from` once the cause is fixed.
 */
export async function runPipeline(
	steps: readonly Step[],
	initial: ReleaseState,
	ctx: ReleaseContext,
	options: RunPipelineOptions = {}
): Promise<PipelineResult> {
	const selected = selectSteps(steps, options.from)
	const completedSteps: string[] = []
	let state = initial

	for (const step of selected) {
		consola.start(pc.dim(step.name))

		let outcome: StepOutcome
		try {
			outcome = await step.run(state, ctx)
		} catch (error) {
			outcome = abort(formatError(error))
		}

		if (outcome.kind === 'abort') {
			consola.error(`${pc.red(step.name)}: ${outcome.reason}`)
			return {
				status: 'aborted',
				reason: outcome.reason,
				failedStep: step.name,
				completedSteps,
				state,
			}
		}

		state = outcome.state
		completedSteps.push(step.name)
	}

	consola.success(`Completed ${pc.bold(completedSteps.length)} release step${completedSteps.length === 1 ? '' : 's'}`)
	return { status: 'completed', state, completedSteps }
}
